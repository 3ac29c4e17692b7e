import { describe, it, expect } from "vitest";
import {
  AbiError,
  AbiErrorCode,
  b256Token,
  boolToken,
  byteToken,
  encodeToken,
  enumToken,
  u64Token,
  unitToken,
  type EnumSchema,
  type Schema,
} from "@regcall/abi";
import {
  receiptCall,
  receiptLog,
  receiptLogData,
  receiptReturn,
  receiptReturnData,
  receiptScriptResult,
  ZERO_BYTES32,
} from "@regcall/tx";

import { decodeLogData, extractResponse, extractReturnToken } from "./extractor.ts";

const TARGET = "0x" + "11".repeat(32);
const OTHER = "0x" + "22".repeat(32);
const HASH = "0x" + "ef".repeat(32);

const Event: EnumSchema = {
  kind: "enum",
  name: "Event",
  variants: [
    { name: "Deposited", schema: { kind: "u64" } },
    { name: "Withdrawn", schema: { kind: "u64" } },
  ],
};

describe("extractReturnToken", () => {
  it("reads a u64 from a Return word", () => {
    const receipts = [receiptReturn(TARGET, 4294967296n)];
    expect(extractReturnToken(receipts, TARGET, { kind: "u64" })).toEqual(u64Token(4294967296n));
  });

  it("right-aligns narrow values in the Return word", () => {
    expect(extractReturnToken([receiptReturn(TARGET, 0x7fn)], TARGET, { kind: "byte" })).toEqual(
      byteToken(0x7f),
    );
    expect(extractReturnToken([receiptReturn(TARGET, 1n)], TARGET, { kind: "bool" })).toEqual(
      boolToken(true),
    );
  });

  it("decodes ReturnData against the output schema", () => {
    const data = encodeToken({ kind: "b256" }, b256Token(HASH));
    const receipts = [receiptReturnData(TARGET, data)];
    expect(extractReturnToken(receipts, TARGET, { kind: "b256" })).toEqual(b256Token(HASH));
  });

  it("ignores returns from other contracts", () => {
    const receipts = [receiptReturn(OTHER, 5n), receiptReturn(TARGET, 9n)];
    expect(extractReturnToken(receipts, TARGET, { kind: "u64" })).toEqual(u64Token(9));
  });

  it("takes the return closing the top-level call when the target is re-entered", () => {
    const receipts = [
      receiptCall(ZERO_BYTES32, TARGET),
      receiptCall(TARGET, OTHER),
      receiptCall(OTHER, TARGET),
      receiptReturn(TARGET, 1n),
      receiptReturn(OTHER, 1n),
      receiptReturn(TARGET, 99n),
      receiptScriptResult(0n, 3000n),
    ];
    expect(extractReturnToken(receipts, TARGET, { kind: "u64" })).toEqual(u64Token(99));
  });

  it("accepts a missing return for unit outputs", () => {
    expect(extractReturnToken([receiptScriptResult(0n, 10n)], TARGET, { kind: "unit" })).toEqual(
      unitToken(),
    );
  });

  it("fails when a value was expected but none was returned", () => {
    try {
      extractReturnToken([receiptReturn(OTHER, 1n)], TARGET, { kind: "u64" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(AbiError);
      expect(e).toMatchObject({ code: AbiErrorCode.TRUNCATED_PAYLOAD, path: "return" });
    }
  });

  it("rejects a Return word for values wider than a word", () => {
    try {
      extractReturnToken([receiptReturn(TARGET, 1n)], TARGET, { kind: "b256" });
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: AbiErrorCode.TRUNCATED_PAYLOAD });
    }
  });

  it("rejects words that do not fit the output type", () => {
    try {
      extractReturnToken([receiptReturn(TARGET, 2n)], TARGET, { kind: "bool" });
      expect.unreachable();
    } catch (e) {
      expect(e).toMatchObject({ code: AbiErrorCode.INVALID_DATA });
    }
  });
});

describe("extractResponse", () => {
  it("returns the value, token, receipts and logs", () => {
    const receipts = [
      receiptCall(ZERO_BYTES32, TARGET),
      receiptLog(TARGET, 0xaan),
      receiptLogData(TARGET, new Uint8Array([1, 2])),
      receiptReturn(TARGET, 3n),
      receiptScriptResult(0n, 100n),
    ];
    const response = extractResponse(receipts, TARGET, { kind: "u64" });
    expect(response.value).toBe(3n);
    expect(response.token).toEqual(u64Token(3));
    expect(response.receipts).toEqual(receipts);
    expect(response.logs).toEqual(["0x00000000000000aa", "0x0102"]);
  });

  it("detokenizes enums", () => {
    const schema: Schema = Event;
    const data = encodeToken(schema, enumToken(1, u64Token(5)));
    const response = extractResponse([receiptReturnData(TARGET, data)], TARGET, schema);
    expect(response.value).toEqual({ tag: "Withdrawn", value: 5n });
  });
});

describe("decodeLogData", () => {
  it("decodes every LogData payload in order", () => {
    const receipts = [
      receiptLogData(TARGET, encodeToken(Event, enumToken(0, u64Token(10)))),
      receiptLog(TARGET, 1n),
      receiptLogData(OTHER, encodeToken(Event, enumToken(1, u64Token(4)))),
    ];
    expect(decodeLogData(receipts, Event)).toEqual([
      enumToken(0, u64Token(10)),
      enumToken(1, u64Token(4)),
    ]);
  });

  it("filters by emitting contract", () => {
    const receipts = [
      receiptLogData(TARGET, encodeToken(Event, enumToken(0, u64Token(10)))),
      receiptLogData(OTHER, encodeToken(Event, enumToken(1, u64Token(4)))),
    ];
    expect(decodeLogData(receipts, Event, OTHER)).toEqual([enumToken(1, u64Token(4))]);
  });
});
