export type { Rng, ISearchGame, ISearchEngine, Outcome } from "./types/search";
export {
  ContractErrorCode,
  ContractViolation,
  isContractViolation,
} from "./errors";
export { canonicalEncode } from "./libs/Encoding";
export { contentDigest } from "./libs/digest";
export { SeededRng, createRng } from "./libs/prng";
