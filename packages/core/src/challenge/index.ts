export {
  POW_ALGORITHM,
  parsePowChallenge,
  powCandidate,
  meetsDifficulty,
  solvePow,
  solvePowCooperatively,
  encodePowResponse,
  type PowChallenge,
  type PowParams,
  type CooperativeOptions,
} from './pow.js';
export {
  md5,
  strictEncode,
  zhipuTimestamp,
  zhipuSign,
  zhipuSignHeaders,
  minimaxSignature,
  minimaxYy,
  minimaxSignRequest,
  type ZhipuSignature,
  type MinimaxSignedHeaders,
} from './signers.js';
export { assembleCookie, splitTokenPair, parseCookieString, type CookieFragment } from './cookies.js';
export { decodeJwtPayload, jwtString, jwtExpiry, type JwtPayload } from './jwt.js';
