import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";

/** 0x-prefixed keccak256 of the canonical JSON of `value`. */
export function contentDigest(value: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(value)));
}
