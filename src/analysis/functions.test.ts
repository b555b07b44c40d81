import { describe, expect, it } from "vitest";
import { sampleEngine } from "../testing/fixtures.js";
import { findContainingFunction, listFunctions } from "./functions.js";

describe("listFunctions", () => {
  it("lists every function in engine order", () => {
    expect(listFunctions(sampleEngine().program)).toEqual([
      { name: "_start", entry_point: "0x101000", signature: "void _start(void)", body_range: "[0x101000, 0x10100f]" },
      { name: "main", entry_point: "0x101010", signature: "int main(void)", body_range: "[0x101010, 0x101023]" },
      { name: "puts", entry_point: "0x101030", signature: "int puts(char * __s)", body_range: "[0x101030, 0x101035]" },
    ]);
  });
});

describe("findContainingFunction", () => {
  const { program } = sampleEngine();
  const at = (text: string) => program.addressFactory.getAddress(text);

  it("finds the function around an interior address", () => {
    expect(findContainingFunction(program, at("0x101015"))?.name).toBe("main");
    expect(findContainingFunction(program, at("0x101023"))?.name).toBe("main");
  });

  it("returns null between functions", () => {
    expect(findContainingFunction(program, at("0x101024"))).toBeNull();
  });
});
