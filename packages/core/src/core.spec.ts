import { strict as assert } from "assert";
import {
  ContractErrorCode,
  ContractViolation,
  SeededRng,
  canonicalEncode,
  createRng,
  contentDigest,
  isContractViolation,
} from "./index";

describe("SeededRng", () => {
  it("should replay the same sequence for the same seed", () => {
    const a = new SeededRng("test-seed");
    const b = new SeededRng("test-seed");
    for (let i = 0; i < 20; i++) {
      assert.equal(a.next(), b.next());
    }
  });

  it("should diverge for different seeds", () => {
    const a = new SeededRng("seed-a");
    const b = new SeededRng("seed-b");
    const seqA = [a.next(), a.next(), a.next()];
    const seqB = [b.next(), b.next(), b.next()];
    assert.notDeepEqual(seqA, seqB);
  });

  it("should keep nextInt within [0, max)", () => {
    const rng = new SeededRng("bounds");
    for (let i = 0; i < 500; i++) {
      const n = rng.nextInt(9);
      assert.ok(Number.isInteger(n) && n >= 0 && n < 9);
    }
  });

  it("should keep nextFloat within [0, 1)", () => {
    const rng = new SeededRng("floats");
    for (let i = 0; i < 500; i++) {
      const f = rng.nextFloat();
      assert.ok(f >= 0 && f < 1);
    }
  });

  it("should seed deterministically through createRng when a seed is given", () => {
    assert.equal(createRng("abc").next(), new SeededRng("abc").next());
  });
});

describe("canonicalEncode", () => {
  it("should sort keys and drop undefined values", () => {
    assert.equal(
      canonicalEncode({ b: 1, a: [2, { d: undefined, c: 3 }] }),
      '{"a":[2,{"c":3}],"b":1}'
    );
  });
});

describe("contentDigest", () => {
  it("should ignore key order", () => {
    assert.equal(contentDigest({ x: 1, y: 2 }), contentDigest({ y: 2, x: 1 }));
  });

  it("should produce a 0x-prefixed 32-byte hex digest", () => {
    assert.match(contentDigest({ State: [], Turn: [], Action: [] }), /^0x[0-9a-f]{64}$/);
  });

  it("should change when the content changes", () => {
    assert.notEqual(contentDigest({ Action: [0] }), contentDigest({ Action: [1] }));
  });
});

describe("ContractViolation", () => {
  it("should carry its code and details", () => {
    const err = new ContractViolation(
      ContractErrorCode.ILLEGAL_MOVE,
      "cell 4 is occupied",
      { index: 4 }
    );
    assert.ok(err instanceof Error);
    assert.equal(err.name, "ContractViolation");
    assert.equal(err.code, ContractErrorCode.ILLEGAL_MOVE);
    assert.deepEqual(err.details, { index: 4 });
  });

  it("should be recognised by isContractViolation, optionally by code", () => {
    const err = new ContractViolation(ContractErrorCode.UNKNOWN_WINNER, "bad");
    assert.equal(isContractViolation(err), true);
    assert.equal(isContractViolation(err, ContractErrorCode.UNKNOWN_WINNER), true);
    assert.equal(isContractViolation(err, ContractErrorCode.ILLEGAL_MOVE), false);
    assert.equal(isContractViolation(new Error("plain")), false);
  });
});
