import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.ts'
import { log } from './plumbing/logger.ts'
import { parseNumber } from './plumbing/parse-number.ts'

if (!process.env.PORT) {
  log('process.env.PORT is undefined - defaulting to 3000')
}
const port = parseNumber(process.env.PORT, 3000)

serve({ fetch: createApp().fetch, port }, (address) => {
  log(`Hono service listening at http://localhost:${address.port}`)
})
