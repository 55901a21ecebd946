import { randomUUID } from "node:crypto";
import { mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { emitCSV, promoteFile, toCSV } from "../harvest/utils/emitter.js";

describe("toCSV", () => {
  it("writes the header and quotes fields that need it", () => {
    const csv = toCSV(["a", "b"], [
      { a: 1, b: null },
      { a: "x,y", b: 'said "hi"' },
    ]);
    expect(csv).toBe('a,b\n1,\n"x,y","said ""hi"""\n');
  });

  it("follows the column order, not the record key order", () => {
    expect(toCSV(["b", "a"], [{ a: "1", b: "2" }])).toBe("b,a\n2,1\n");
  });

  it("leaves absent columns empty", () => {
    expect(toCSV(["a", "b"], [{ a: "only" }])).toBe("a,b\nonly,\n");
  });
});

describe("file output", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `harvest-emit-${randomUUID().slice(0, 8)}`);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the directory and returns the written path", async () => {
    const path = await emitCSV(join(dir, "nested"), "rows.csv", ["id"], [{ id: "P1" }]);

    expect(path).toBe(join(dir, "nested", "rows.csv"));
    expect(readFileSync(path, "utf8")).toBe("id\nP1\n");
  });

  it("replaces the destination with the exact source bytes", async () => {
    mkdirSync(dir, { recursive: true });
    const src = join(dir, "src.csv");
    const dest = join(dir, "dest.csv");
    writeFileSync(src, "name\nJosé Núñez\n");
    writeFileSync(dest, "stale content that is longer than the new file\n");

    await promoteFile(src, dest);

    expect(readFileSync(dest).equals(readFileSync(src))).toBe(true);
    expect(readdirSync(dir).sort()).toEqual(["dest.csv", "src.csv"]);
  });
});
