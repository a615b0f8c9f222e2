export type { CscMatrix } from './csc.js';
export {
  cscEmpty,
  cscIdentity,
  cscFromTriplets,
  cscFromDense,
  cscNnz,
  cscGet,
  cscScale,
  cscAdd,
  cscMulMat,
  cscDiag,
  cscToDense,
  cscEquals,
} from './csc.js';
