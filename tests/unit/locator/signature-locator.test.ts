// tests/unit/locator/signature-locator.test.ts
import { describe, it, expect } from "vitest";
import assert from "assert";
import {
  SignatureLocator,
  findSignature,
  locateSignature,
} from "../../../src/locator/index.js";
import { LocatorError, LocatorErrorCode } from "../../../src/common/errors.js";
import { toHex } from "../../../src/common/codecs.js";
import { isValidSignature } from "../../../src/extract/index.js";
import { createLogger } from "../../../src/logger.js";
import {
  SAMPLE_SUBJECT,
  concat,
  int,
  longSeq,
  octets,
  seq,
  signatureBlock,
} from "../../helpers/der.js";

const quiet = createLogger("error");
const PREFIX = new Uint8Array(64).fill(0x90);

describe("SignatureLocator: acceptance", () => {
  it("finds a block appended to file content", () => {
    const block = signatureBlock();
    const buf = concat(PREFIX, block);
    const match = locateSignature(buf, { logger: quiet });
    assert.strictEqual(match.offset, PREFIX.length);
    assert.strictEqual(match.fullBytes.length, block.length);
    assert.strictEqual(toHex(match.fullBytes), toHex(block));
    assert.strictEqual(isValidSignature(match.validation), true);
    assert.deepStrictEqual(match.validation.commonName, {
      found: true,
      value: SAMPLE_SUBJECT.commonName,
    });
  });

  it("describes the outer element of the match", () => {
    const block = signatureBlock();
    const match = locateSignature(concat(PREFIX, block), { logger: quiet });
    assert.strictEqual(match.element.offset, PREFIX.length);
    assert.strictEqual(match.element.headerLength, 4);
    assert.strictEqual(match.element.contentLength, block.length - 4);
    assert.strictEqual(match.element.depth, 0);
  });

  it("returns a frozen view over the scanned buffer", () => {
    const buf = concat(PREFIX, signatureBlock());
    const match = locateSignature(buf, { logger: quiet });
    assert.ok(Object.isFrozen(match));
    assert.strictEqual(match.fullBytes.buffer, buf.buffer);
    assert.strictEqual(match.fullBytes.byteOffset, buf.byteOffset + PREFIX.length);
  });

  it("finds a block followed by trailing bytes", () => {
    const buf = concat(PREFIX, signatureBlock(), new Uint8Array(16).fill(0x00));
    assert.strictEqual(findSignature(buf, { logger: quiet })?.offset, PREFIX.length);
  });

  it("finds a block at offset 0", () => {
    assert.strictEqual(findSignature(signatureBlock(), { logger: quiet })?.offset, 0);
  });

  it("is deterministic", () => {
    const buf = concat(PREFIX, signatureBlock(), PREFIX, signatureBlock());
    const locator = new SignatureLocator({ logger: quiet });
    const first = locator.locate(buf).offset;
    assert.strictEqual(locator.locate(buf).offset, first);
    assert.strictEqual(locator.locate(buf).offset, first);
  });
});

describe("SignatureLocator: candidate order", () => {
  it("accepts the rightmost complete block", () => {
    const a = signatureBlock({ ...SAMPLE_SUBJECT, commonName: "First" });
    const b = signatureBlock({ ...SAMPLE_SUBJECT, commonName: "Second" });
    const match = locateSignature(concat(PREFIX, a, b), { logger: quiet });
    assert.strictEqual(match.offset, PREFIX.length + a.length);
    assert.deepStrictEqual(match.validation.commonName, { found: true, value: "Second" });
  });

  it("skips a later structure that decodes but lacks attributes", () => {
    const empty = longSeq(seq(int(1)), octets(3));
    const buf = concat(PREFIX, signatureBlock(), empty);
    assert.strictEqual(locateSignature(buf, { logger: quiet }).offset, PREFIX.length);
  });

  it("skips a later candidate whose length runs past the buffer", () => {
    const buf = concat(PREFIX, signatureBlock(), [0x30, 0x82, 0xff, 0xff]);
    assert.strictEqual(locateSignature(buf, { logger: quiet }).offset, PREFIX.length);
  });

  it("prefers an inner block over an enclosing one", () => {
    const block = signatureBlock();
    const outer = longSeq(int(1), block);
    const buf = concat(PREFIX, outer);
    // outer header is 4 bytes, INTEGER 1 is 3
    assert.strictEqual(locateSignature(buf, { logger: quiet }).offset, PREFIX.length + 7);
  });
});

describe("SignatureLocator: rejection", () => {
  it("rejects a structurally valid block without certificate attributes", () => {
    // 30 82 00 08 | SEQUENCE { INTEGER 1 } | OCTET STRING { 00 }
    const tail = [0x30, 0x82, 0x00, 0x08, 0x30, 0x03, 0x02, 0x01, 0x01, 0x04, 0x01, 0x00];
    const buf = concat(PREFIX, tail);
    assert.strictEqual(findSignature(buf, { logger: quiet }), null);
    expect(() => locateSignature(buf, { logger: quiet })).toThrow(LocatorError);
    try {
      locateSignature(buf, { logger: quiet });
    } catch (e) {
      assert.ok(e instanceof LocatorError);
      assert.strictEqual(e.code, LocatorErrorCode.NoSignatureFound);
      assert.strictEqual(e.message, "no valid signature found");
      assert.strictEqual(e.candidates, 1);
    }
  });

  it("reports NoSignatureFound for tiny and malformed buffers", () => {
    for (const buf of [[], [0x30], [0x30, 0x82], [0x30, 0x82, 0xff, 0xff], [0x30, 0x82, 0x00]]) {
      assert.strictEqual(findSignature(new Uint8Array(buf), { logger: quiet }), null);
    }
  });

  it("finds nothing in any truncation of a block", () => {
    const block = signatureBlock();
    for (let len = 0; len < block.length; len++) {
      assert.strictEqual(findSignature(block.subarray(0, len), { logger: quiet }), null);
    }
    assert.notStrictEqual(findSignature(block, { logger: quiet }), null);
  });

  it("honours walker limits", () => {
    // the attribute OIDs sit at depth 4: block, Name, SET, SEQUENCE
    const buf = concat(PREFIX, signatureBlock());
    assert.strictEqual(new SignatureLocator({ maxDepth: 3, logger: quiet }).find(buf), null);
    assert.notStrictEqual(new SignatureLocator({ maxDepth: 4, logger: quiet }).find(buf), null);
  });
});
