import type { JwtAlgorithm } from '../jwt.ts'

export interface JwtHeader {
  alg: JwtAlgorithm
  typ?: string
  kid?: string
}
