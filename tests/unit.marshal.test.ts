import { describe, it, expect } from "vitest";
import { marshalResult, marshalValue, parseInt8, parseLocalTimestamp } from "../src/schema/marshal";
import { sanitizeMessage } from "../src/errors";

describe("marshalValue", () => {
  it("passes JSON scalars through", () => {
    expect(marshalValue("USD")).toBe("USD");
    expect(marshalValue(true)).toBe(true);
    expect(marshalValue(42.5)).toBe(42.5);
    expect(marshalValue(null)).toBeNull();
    expect(marshalValue(undefined)).toBeNull();
  });

  it("spells out non-finite floats", () => {
    expect(marshalValue(Number.NaN)).toBe("NaN");
    expect(marshalValue(Number.POSITIVE_INFINITY)).toBe("Infinity");
    expect(marshalValue(Number.NEGATIVE_INFINITY)).toBe("-Infinity");
  });

  it("converts bigints to numbers only when exact", () => {
    expect(marshalValue(BigInt(12))).toBe(12);
    expect(marshalValue(BigInt("9007199254740993"))).toBe("9007199254740993");
  });

  it("renders dates as ISO-8601", () => {
    expect(marshalValue(new Date(Date.UTC(2024, 0, 15, 8, 30, 0)))).toBe("2024-01-15T08:30:00.000Z");
    expect(marshalValue(new Date("not a date"))).toBeNull();
  });

  it("renders binary data as bytea hex text", () => {
    expect(marshalValue(Buffer.from([0x01, 0xab, 0xff]))).toBe("\\x01abff");
    expect(marshalValue(new Uint8Array([0x00, 0x10]))).toBe("\\x0010");
  });

  it("walks arrays and json objects", () => {
    const stamp = new Date(Date.UTC(2024, 4, 1));
    expect(marshalValue([1, null, [stamp]])).toEqual([1, null, ["2024-05-01T00:00:00.000Z"]]);
    expect(marshalValue({ tags: ["a"], nested: { at: stamp, big: BigInt(7) } })).toEqual({
      tags: ["a"],
      nested: { at: "2024-05-01T00:00:00.000Z", big: 7 },
    });
  });

  it("falls back to the string form of other objects", () => {
    class Money {
      toString() {
        return "$1.00";
      }
    }
    expect(marshalValue(new Money())).toBe("$1.00");
  });
});

describe("text parsers", () => {
  it("parses int8 into a number while it stays exact", () => {
    expect(parseInt8("5")).toBe(5);
    expect(parseInt8("-9007199254740991")).toBe(-9007199254740991);
    expect(parseInt8("9223372036854775807")).toBe("9223372036854775807");
  });

  it("keeps timestamp wall-clock values without shifting zones", () => {
    expect(parseLocalTimestamp("2024-03-01 10:15:30.5")).toBe("2024-03-01T10:15:30.5");
    expect(parseLocalTimestamp("infinity")).toBe("infinity");
  });
});

describe("marshalResult", () => {
  it("aligns rows with the declared output columns", () => {
    const out = marshalResult({
      fields: [
        { name: "code", dataTypeID: 1043 },
        { name: "rate", dataTypeID: 1700 },
        { name: "code", dataTypeID: 1043 },
      ],
      rows: [["USD", "1.0000", "usd"]],
    });
    expect(out).toEqual({ columns: ["code", "rate", "code"], rows: [["USD", "1.0000", "usd"]], rowCount: 1 });
  });
});

describe("sanitizeMessage", () => {
  it("redacts connection strings and keeps the first line", () => {
    expect(sanitizeMessage("could not reach postgresql://gateway:test-secret@db:5432/app\nDETAIL: more")).toBe(
      "could not reach [redacted]",
    );
  });
});
