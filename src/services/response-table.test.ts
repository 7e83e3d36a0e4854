import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { findResponse, loadResponseTable, parseResponseTable } from "./response-table";

describe("parseResponseTable", () => {
  test("splits each line at the first space", () => {
    expect(parseResponseTable("/a hello\n/b hello world  \n")).toEqual([
      { path: "/a", body: "hello" },
      { path: "/b", body: "hello world  " },
    ]);
  });

  test("strips CRLF line endings", () => {
    expect(parseResponseTable("/a hello\r\n/b world\r\n")).toEqual([
      { path: "/a", body: "hello" },
      { path: "/b", body: "world" },
    ]);
  });

  test("skips blank lines and lines without a body separator", () => {
    expect(parseResponseTable("\n/orphan\n/a hello\n")).toEqual([{ path: "/a", body: "hello" }]);
  });

  test("keeps an empty body after a trailing space", () => {
    expect(parseResponseTable("/empty \n")).toEqual([{ path: "/empty", body: "" }]);
  });
});

describe("findResponse", () => {
  const table = parseResponseTable("/a first\n/b world\n/a second\n");

  test("returns the first matching body", () => {
    expect(findResponse(table, "/a")).toBe("first");
    expect(findResponse(table, "/b")).toBe("world");
  });

  test("returns undefined for an unknown path", () => {
    expect(findResponse(table, "/c")).toBeUndefined();
  });

  test("matches paths exactly", () => {
    expect(findResponse(table, "/a/")).toBeUndefined();
    expect(findResponse(table, "/A")).toBeUndefined();
  });
});

describe("loadResponseTable", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "response-table-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads entries from disk", async () => {
    const file = join(dir, "responses.txt");
    await writeFile(file, "/a hello\n/b world\n");

    expect(await loadResponseTable(file)).toEqual([
      { path: "/a", body: "hello" },
      { path: "/b", body: "world" },
    ]);
  });

  test("rejects when the file is missing", async () => {
    await expect(loadResponseTable(join(dir, "missing.txt"))).rejects.toThrow("ENOENT");
  });
});
