import { readFile } from "node:fs/promises";

/**
 * One `<path> <body>` line of the canned-response file.
 */
export interface ResponseEntry {
  path: string;
  body: string;
}

export type ResponseTable = readonly ResponseEntry[];

/**
 * Parse the canned-response file. The first space splits path from body;
 * anything after it, further spaces included, is the body. Lines without a
 * space carry no mapping and are skipped.
 */
export function parseResponseTable(text: string): ResponseEntry[] {
  const entries: ResponseEntry[] = [];

  for (const rawLine of text.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    const separator = line.indexOf(" ");
    if (separator === -1) {
      continue;
    }
    entries.push({
      path: line.slice(0, separator),
      body: line.slice(separator + 1),
    });
  }

  return entries;
}

/**
 * First match wins; duplicates further down are never reached.
 */
export function findResponse(table: ResponseTable, path: string): string | undefined {
  return table.find((entry) => entry.path === path)?.body;
}

export async function loadResponseTable(file: string): Promise<ResponseEntry[]> {
  const text = await readFile(file, "utf-8");
  return parseResponseTable(text);
}
