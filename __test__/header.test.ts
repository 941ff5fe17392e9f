import { describe, it, expect } from "vitest";
import {
  BinaryReader,
  BoundsError,
  FormatError,
  R1csSectionType,
  decodeHeader,
  decodeR1cs,
  encodeR1cs,
} from "../src";
import { catchError, flatScenario, sectionedScenario, setU32, SCENARIO_CONSTRAINTS } from "./fixtures";

// sectioned scenario offsets: section table at 12, header body at 24, constraint section at 88
const N8 = 24;
const N_PUB_IN = 68;
const N_PRV_IN = 72;
const CONSTRAINT_SECTION_TYPE = 88;

describe("decodeHeader", () => {
  it("reads the sectioned header fields", () => {
    const file = sectionedScenario();
    const { header, constraints } = decodeHeader(new BinaryReader(encodeR1cs(file)));

    expect(header).toEqual(file.header);
    expect(constraints).toEqual({ position: 100, size: 444 });
  });

  it("rejects a bad magic tag before reading anything else", () => {
    const err = catchError(() => decodeR1cs(Uint8Array.of(0x72, 0x31, 0x63, 0x7a)));

    expect(err).toBeInstanceOf(FormatError);
    expect(err).toMatchObject({ code: "FORMAT", details: { actual: "7231637a" } });
  });

  it("rejects unsupported versions", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, 4, 2);

    expect(() => decodeR1cs(bytes)).toThrow("unsupported R1CS version 2");
  });

  it("locates sections by type and skips unknown ones", () => {
    const bytes = encodeR1cs(sectionedScenario(), {
      extraSections: [{ type: R1csSectionType.Wire2Label, body: new Uint8Array(40) }],
      constraintsFirst: true,
    });
    const file = decodeR1cs(bytes);

    expect(file.header.totalWireCount).toBe(5);
    expect(file.constraints).toEqual(SCENARIO_CONSTRAINTS);
  });

  it("rejects a section that overruns the buffer", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, 16, 1000);

    expect(() => decodeR1cs(bytes)).toThrow(FormatError);
    expect(() => decodeR1cs(bytes)).toThrow("declares 1000 bytes");
  });

  it("rejects a missing constraint section", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, 8, 1);

    expect(() => decodeR1cs(bytes)).toThrow("missing constraint section");
  });

  it("rejects a duplicate header section", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, CONSTRAINT_SECTION_TYPE, R1csSectionType.Header);

    expect(() => decodeR1cs(bytes)).toThrow("duplicate section of type 1");
  });

  it("rejects a field element size of zero", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, N8, 0);

    expect(() => decodeR1cs(bytes)).toThrow(BoundsError);
  });

  it("rejects field elements above the configured ceiling", () => {
    const bytes = encodeR1cs(sectionedScenario());

    expect(() => decodeR1cs(bytes, { limits: { maxFieldElementSize: 16 } })).toThrow(
      "field element size 32 outside 1..16",
    );
  });

  it("rejects more public signals than non-constant wires", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, N_PUB_IN, 5);

    expect(() => decodeR1cs(bytes)).toThrow(BoundsError);
  });

  it("rejects private signals that do not fit next to the public ones", () => {
    const bytes = encodeR1cs(sectionedScenario());
    setU32(bytes, N_PRV_IN, 3);

    const err = catchError(() => decodeR1cs(bytes));
    expect(err).toBeInstanceOf(BoundsError);
    expect(err).toMatchObject({
      details: { publicInputCount: 2, privateInputSignalCount: 3, totalWireCount: 5 },
    });
  });

  it("reads the flat header with the element size in words", () => {
    const { header, constraints } = decodeHeader(new BinaryReader(encodeR1cs(flatScenario())), {
      layout: "flat",
    });

    expect(header.fieldElementSize).toBe(32);
    expect(header.prime).toBeUndefined();
    expect(header.curve).toBe("unknown");
    expect(constraints).toEqual({ position: 28 });
  });

  it("rejects a flat header whose counts do not add up", () => {
    const file = flatScenario();
    file.header.privateInputCount = 3;

    expect(() => decodeR1cs(encodeR1cs(file), { layout: "flat" })).toThrow(
      "public (2) + private (3) inputs must equal wires - 1 (4)",
    );
  });

  it("rejects a flat field size of zero words", () => {
    const bytes = encodeR1cs(flatScenario());
    setU32(bytes, 8, 0);

    expect(() => decodeR1cs(bytes, { layout: "flat" })).toThrow(BoundsError);
  });

  it("rejects an empty buffer as truncated", () => {
    expect(() => decodeR1cs(new Uint8Array(0))).toThrow("unexpected end of data reading magic tag");
  });
});
