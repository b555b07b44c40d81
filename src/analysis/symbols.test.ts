import { describe, expect, it } from "vitest";
import { engineFrom, oneFunctionSnapshot, sampleEngine } from "../testing/fixtures.js";
import { listSymbols } from "./symbols.js";

describe("listSymbols", () => {
  it("lists non-external symbols with kind and source", () => {
    expect(listSymbols(sampleEngine().program)).toEqual([
      { name: "_start", address: "0x101000", type: "Function", source: "IMPORTED" },
      { name: "main", address: "0x101010", type: "Function", source: "ANALYSIS" },
      { name: "puts", address: "0x101030", type: "Function", source: "IMPORTED" },
      { name: "s_hello", address: "0x104000", type: "Label", source: "ANALYSIS" },
      { name: "PTR_puts_00104008", address: "0x104008", type: "Label", source: "ANALYSIS" },
    ]);
  });

  it("keeps the table's order instead of sorting by address", () => {
    const { program } = engineFrom(oneFunctionSnapshot({
      symbols: [{ name: "late", address: "0x1008" }, { name: "early", address: "0x1001" }],
    }));
    expect(listSymbols(program).map(s => s.name)).toEqual(["entry", "late", "early"]);
  });
});
