import { describe, test, expect } from "vitest";
import util from "node-inspect-extracted";
import {SiftError, ErrFacet, type SiftErrorJSON} from "../sift-error.js";
import {BadInput, HasExpression, Invariant} from "../errors/basic-errors.js";

// -- Test facets and error definitions -----------------------------------------

const Retryable = ErrFacet.marker("Retryable");
const HasField = ErrFacet.data<{ field: string }>("HasField");
const HasOffset = ErrFacet.data<{ offset: number; hint?: string }>("HasOffset");

const Lookup = SiftError.boundary("lookup");

const ErrFieldMissing = Lookup.define("field_missing", {
  facets: [BadInput, HasField],
  message: (d) => `Unknown field: ${d.field}`,
});

const Network = SiftError.boundary("network");

const ErrTimeout = Network.define("timeout", {
  facets: [Retryable],
  message: () => "Timed out",
});

const ErrBrokenTable = Lookup.define("broken_table", {
  facets: [Invariant],
  message: () => "Lookup table is corrupt",
});

const ErrBadToken = Lookup.define("bad_token", {
  customProps: ErrFacet.props<{ token: string }>(),
  facets: [HasExpression, HasOffset],
  message: (d) => `Unexpected '${d.token}' in ${d.expression} at ${d.offset}`,
});

// -- Tests ---------------------------------------------------------------------

describe("ErrFacet", () => {
  test("marker() and data() create frozen facets", () => {
    expect(BadInput.kind).toBe("marker");
    expect(HasField.kind).toBe("data");
    expect(HasField.name).toBe("HasField");
    expect(Object.isFrozen(BadInput)).toBe(true);
    expect(Object.isFrozen(HasField)).toBe(true);
  });
});

describe("boundary.define()", () => {
  test("prefixes the code with the domain", () => {
    expect(ErrFieldMissing.code).toBe("lookup.field_missing");
    expect(ErrFieldMissing.domain).toBe("lookup");
  });

  test("each boundary keeps its own domain", () => {
    expect(ErrTimeout.code).toBe("network.timeout");
    expect(ErrTimeout.domain).toBe("network");
    expect(Network.domain).toBe("network");
  });

  test("boundary.is() matches errors of its domain only", () => {
    expect(Lookup.is(ErrFieldMissing.create({ field: "age" }))).toBe(true);
    expect(Lookup.is(ErrBrokenTable.create({}))).toBe(true);
    expect(Lookup.is(ErrTimeout.create({}))).toBe(false);
    expect(Lookup.is(new Error("plain"))).toBe(false);
  });
});

describe("ErrorDef.create()", () => {
  test("carries code, message and data", () => {
    const err = ErrFieldMissing.create({ field: "age" });

    expect(err.code).toBe("lookup.field_missing");
    expect(err.domain).toBe("lookup");
    expect(err.message).toBe("Unknown field: age");
    expect(err.data.field).toBe("age");
  });

  test("custom props and facet data merge", () => {
    const err = ErrBadToken.create({ token: "%", expression: "a % b", offset: 2 });

    expect(err.message).toBe("Unexpected '%' in a % b at 2");
    expect(err.data).toEqual({ token: "%", expression: "a % b", offset: 2 });
  });

  test("is an Error with a stack and a coded name", () => {
    const err = ErrFieldMissing.create({ field: "age" });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("SiftError[lookup.field_missing]");
    expect(err.stack).toContain("sift-error.test.ts");
  });

  test("data is a shallow copy", () => {
    const data = { field: "age" };
    const err = ErrFieldMissing.create(data);
    data.field = "mutated";

    expect(err.data.field).toBe("age");
  });
});

describe("ErrorDef.is()", () => {
  test("matches the same definition only", () => {
    const err = ErrFieldMissing.create({ field: "age" });

    expect(ErrFieldMissing.is(err)).toBe(true);
    expect(ErrTimeout.is(err)).toBe(false);
    expect(ErrFieldMissing.is(new Error("nope"))).toBe(false);
    expect(ErrFieldMissing.is(null)).toBe(false);
    expect(ErrFieldMissing.is("string")).toBe(false);
  });

  test("narrows data type", () => {
    const err: unknown = ErrFieldMissing.create({ field: "age" });

    if (ErrFieldMissing.is(err)) {
      const field: string = err.data.field;
      expect(field).toBe("age");
    } else {
      throw new Error("Expected is() to match");
    }
  });
});

describe("SiftError.has()", () => {
  test("detects marker and data facets", () => {
    const err = ErrFieldMissing.create({ field: "age" });

    expect(SiftError.has(err, BadInput)).toBe(true);
    expect(SiftError.has(err, HasField)).toBe(true);
    expect(SiftError.has(err, Retryable)).toBe(false);
    expect(SiftError.has(err, HasOffset)).toBe(false);
  });

  test("returns false for non-SiftErrors", () => {
    expect(SiftError.has(new Error("nope"), BadInput)).toBe(false);
    expect(SiftError.has(undefined, BadInput)).toBe(false);
  });

  test("narrows data for data facets", () => {
    const err: unknown = ErrBadToken.create({ token: "!", expression: "!", offset: 0 });

    if (SiftError.has(err, HasExpression) && SiftError.has(err, HasOffset)) {
      const expression: string = err.data.expression;
      const offset: number = err.data.offset;
      expect(expression).toBe("!");
      expect(offset).toBe(0);
    } else {
      throw new Error("Expected has() to match");
    }
  });
});

describe("SiftError.wrap()", () => {
  test("passes SiftErrors through unchanged", () => {
    const err = ErrTimeout.create({});
    expect(SiftError.wrap(err)).toBe(err);
  });

  test("wraps a plain Error preserving its stack", () => {
    const original = new Error("boom");
    const wrapped = SiftError.wrap(original);

    expect(SiftError.isSiftError(wrapped)).toBe(true);
    expect(wrapped.code).toBe("unknown");
    expect(wrapped.domain).toBe("unknown");
    expect(wrapped.message).toBe("boom");
    expect(wrapped.stack).toBe(original.stack);
  });

  test("wraps strings", () => {
    const wrapped = SiftError.wrap("something broke");

    expect(wrapped.message).toBe("something broke");
    expect(wrapped.code).toBe("unknown");
  });
});

describe("toJSON()", () => {
  test("returns a JSON-safe structure", () => {
    const err = ErrFieldMissing.create({ field: "age" });
    const json = err.toJSON();

    expect(json.code).toBe("lookup.field_missing");
    expect(json.domain).toBe("lookup");
    expect(json.message).toBe("Unknown field: age");
    expect(json.data).toEqual({ field: "age" });
    expect(json.facets).toEqual(["BadInput", "HasField"]);
    expect(json.stack).toBeDefined();

    const roundTripped: SiftErrorJSON = JSON.parse(JSON.stringify(json));
    expect(roundTripped.code).toBe("lookup.field_missing");
  });

  test("wrapped values serialise with no facets", () => {
    expect(SiftError.wrap("boom").toJSON()).toMatchObject({ code: "unknown", domain: "unknown", message: "boom", data: {}, facets: [] });
  });
});

describe("prettyPrint()", () => {
  test("renders code, message and data without colour", () => {
    const err = ErrFieldMissing.create({ field: "age" });

    expect(err.prettyPrint()).toBe(
      'SiftError: lookup.field_missing: Unknown field: age\n  └ data: {"field":"age"}',
    );
  });

  test("omits the data line for marker-only errors", () => {
    expect(ErrTimeout.create({}).prettyPrint()).toBe("SiftError: network.timeout: Timed out");
  });

  test("colours the data line dim", () => {
    expect(ErrFieldMissing.create({ field: "age" }).prettyPrint({ color: true })).toBe(
      'SiftError: \x1b[31mlookup.field_missing\x1b[0m: Unknown field: age\n  \x1b[2m└ data: {"field":"age"}\x1b[0m',
    );
  });

  test("uses ANSI escapes when colour is on", () => {
    const out = ErrTimeout.create({}).prettyPrint({ color: true });
    expect(out).toBe("SiftError: \x1b[31mnetwork.timeout\x1b[0m: Timed out");
  });

  test("appends the stack trace on request", () => {
    const out = ErrTimeout.create({}).prettyPrint({ includeStackTrace: true });
    const lines = out.split("\n");

    expect(lines[0]).toBe("SiftError: network.timeout: Timed out");
    expect(lines[1]).toBe("  ➝ Stack trace:");
    expect(lines[2].trimStart().startsWith("at ")).toBe(true);
  });
});

describe("inspect output", () => {
  test("util.inspect renders through prettyPrint", () => {
    const err = ErrFieldMissing.create({ field: "age" });
    const firstLines = util.inspect(err).split("\n").slice(0, 2);

    expect(firstLines).toEqual([
      "SiftError: lookup.field_missing: Unknown field: age",
      '  └ data: {"field":"age"}',
    ]);
  });
});
