import { isErrorReport, type AnalysisReport, type InstructionRecord, type ReportResult } from "../analysis/schema.js";

function cell(s: string) {
  return s.replace(/\|/g, "\\|");
}

export function formatListingLine(ins: InstructionRecord) {
  const line = `${`${ins.address}:`.padEnd(18)} ${ins.bytes.padEnd(16)} ${ins.mnemonic.padEnd(8)} ${ins.operands.padEnd(20)}`;
  return ins.comment ? `${line}  ; ${ins.comment}` : line.trimEnd();
}

export function renderReportMarkdown(r: ReportResult): string {
  if (isErrorReport(r)) {
    return [
      `# Analysis report`,
      ``,
      `- Program: ${r.program_name}`,
      `- Status: error`,
      `- Message: ${r.message}`,
    ].join("\n");
  }
  const lines: string[] = [];
  lines.push(`# Analysis report: ${r.program_name}`);
  lines.push("");
  lines.push(`## Overview`);
  lines.push(`- Entry point: ${r.entry_point}`);
  lines.push(`- Image base: ${r.image_base}`);
  lines.push(`- Language: ${r.language}`);
  lines.push(`- Functions: ${r.functions.length} | Symbols: ${r.symbols.length} | Instructions: ${r.disassembly.length}`);
  lines.push("");

  if (r.functions.length) {
    lines.push(`## Functions`);
    lines.push(`| Name | Entry | Signature | Body |`);
    lines.push(`|---|---:|---|---|`);
    for (const f of r.functions) {
      lines.push(`| ${cell(f.name)} | ${f.entry_point} | ${cell(f.signature)} | ${f.body_range} |`);
    }
    lines.push("");
  }

  if (r.symbols.length) {
    lines.push(`## Symbols`);
    lines.push(`| Name | Address | Type | Source |`);
    lines.push(`|---|---:|---|---|`);
    for (const s of r.symbols) {
      lines.push(`| ${cell(s.name)} | ${s.address} | ${s.type} | ${s.source} |`);
    }
    lines.push("");
  }

  if (r.entry_function) {
    lines.push(`## Entry function: ${r.entry_function.name} @ ${r.entry_function.entry_point}`);
    lines.push("```c");
    lines.push(r.entry_function.code.trimEnd());
    lines.push("```");
    lines.push("");
  }

  if (r.disassembly.length) {
    lines.push(`## Disassembly`);
    lines.push("```asm");
    for (const ins of r.disassembly) lines.push(formatListingLine(ins));
    lines.push("```");
    lines.push("");
  }

  return lines.join("\n");
}

export function renderDisassemblyListing(r: AnalysisReport): string {
  const lines = [
    `; Disassembly`,
    `; Binary: ${r.program_name}`,
    `; Entry Point: ${r.entry_point}`,
    `; Architecture: ${r.language}`,
    `; Image Base: ${r.image_base}`,
    `;`,
    ``,
  ];
  for (const ins of r.disassembly) lines.push(formatListingLine(ins));
  return lines.join("\n");
}

export function renderDecompilerView(r: AnalysisReport): string {
  const lines = [
    `// Decompiler`,
    `// Binary: ${r.program_name}`,
    `// Entry Point: ${r.entry_point}`,
    `// Architecture: ${r.language}`,
    `//`,
    ``,
  ];
  const entry = r.entry_function;
  if (entry) {
    lines.push(`// Function: ${entry.name}`);
    lines.push(`// Address: ${entry.entry_point}`);
    lines.push("");
    lines.push(...entry.code.split("\n"));
    lines.push("");
  }

  lines.push("");
  lines.push("// Other Functions:");
  lines.push("");
  for (const f of r.functions) {
    if (entry && f.entry_point === entry.entry_point) continue;
    lines.push(`// ${f.name} @ ${f.entry_point}`);
    lines.push(`// ${f.signature}`);
    lines.push("");
  }
  return lines.join("\n");
}
