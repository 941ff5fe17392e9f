import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { bytesToHex } from "./field";
import type { StackItem } from "./proof/packager";

export const OUTPUT_FILES = {
  items: "stack_items.txt",
  json: "stack_items.json",
  script: "script.hex",
} as const;

/** `<index>:<hex>` per item, newline-terminated */
export function formatStackItemLines(items: readonly StackItem[]): string {
  return items.map((item, i) => `${i}:${bytesToHex(item)}\n`).join("");
}

export function formatStackItemJson(items: readonly StackItem[]): string {
  return JSON.stringify(items.map(bytesToHex), null, 2) + "\n";
}

export function formatScriptHex(script: Uint8Array): string {
  return bytesToHex(script) + "\n";
}

export interface WrittenArtifacts {
  items: string;
  json: string;
  script: string;
}

/** Write the three output artifacts into `outDir`, creating it if needed */
export function writeArtifacts(
  outDir: string,
  items: readonly StackItem[],
  script: Uint8Array,
): WrittenArtifacts {
  mkdirSync(outDir, { recursive: true });
  const paths = {
    items: join(outDir, OUTPUT_FILES.items),
    json: join(outDir, OUTPUT_FILES.json),
    script: join(outDir, OUTPUT_FILES.script),
  };
  writeFileSync(paths.items, formatStackItemLines(items), "utf8");
  writeFileSync(paths.json, formatStackItemJson(items), "utf8");
  writeFileSync(paths.script, formatScriptHex(script), "utf8");
  return paths;
}
