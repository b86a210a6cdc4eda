import { describe, expect, it } from "vitest";
import { type CliIO, runCli } from "./program.js";

function memoryIo(files: Record<string, string>) {
  const store = new Map(Object.entries(files));
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    readFile(path) {
      const text = store.get(path);
      if (text === undefined) throw new Error(`ENOENT: ${path}`);
      return text;
    },
    writeFile(path, text) {
      store.set(path, text);
    },
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    color: false,
  };
  return { io, store, out, err };
}

describe("linepad cli", () => {
  describe("eval", () => {
    it("prints the evaluated document", async () => {
      const { io, out } = memoryIo({ "doc.txt": "2+3=\n$10 * 3 =\n" });
      expect(await runCli(["eval", "doc.txt"], io)).toBe(0);
      expect(out).toEqual(["2 + 3 = 5\n$10 * 3 = $30.00\n"]);
    });

    it("writes back with --write", async () => {
      const { io, store, out } = memoryIo({ "doc.txt": "2+3=" });
      expect(await runCli(["eval", "doc.txt", "--write"], io)).toBe(0);
      expect(store.get("doc.txt")).toBe("2 + 3 = 5");
      expect(out).toEqual([]);
    });

    it("prints failed lines as ERR", async () => {
      const { io, out } = memoryIo({ "doc.txt": "1 / foo =" });
      await runCli(["eval", "doc.txt"], io);
      expect(out).toEqual(["1 / foo = ERR"]);
    });

    it("honours --active-line", async () => {
      const { io, out } = memoryIo({ "doc.txt": "2+3=" });
      await runCli(["eval", "doc.txt", "--active-line", "1"], io);
      expect(out).toEqual(["2+3 = 5"]);
    });

    it("uses a fixed clock and zone", async () => {
      const { io, out } = memoryIo({ "doc.txt": "now =" });
      await runCli(["eval", "doc.txt", "--now", "2025-03-10T15:30:00Z", "--tz", "UTC"], io);
      expect(out).toEqual(["now = 2025-03-10 15:30 UTC"]);
    });

    it("rejects a non-numeric --active-line", async () => {
      const { io } = memoryIo({ "doc.txt": "1 =" });
      expect(await runCli(["eval", "doc.txt", "--active-line", "abc"], io)).toBe(1);
    });

    it("reports an unknown zone", async () => {
      const { io, err } = memoryIo({ "doc.txt": "1 =" });
      expect(await runCli(["eval", "doc.txt", "--tz", "Mars/Base"], io)).toBe(1);
      expect(err).toEqual(["Error: timeZone: unknown zone Mars/Base"]);
    });

    it("reports a missing file", async () => {
      const { io, err } = memoryIo({});
      expect(await runCli(["eval", "missing.txt"], io)).toBe(1);
      expect(err).toEqual(["Error: ENOENT: missing.txt"]);
    });
  });

  describe("adjust", () => {
    it("renumbers references after an insert", async () => {
      const { io, out } = memoryIo({
        "old.txt": "100 =\n50 =\n\\2 + 5 =",
        "new.txt": "100 =\n\n50 =\n\\2 + 5 =",
      });
      expect(await runCli(["adjust", "old.txt", "new.txt"], io)).toBe(0);
      expect(out).toEqual(["100 =\n\n50 =\n\\3 + 5 ="]);
    });
  });

  describe("deps", () => {
    const doc = "1 =\n\\1 + 1 =\n\\2 + 1 =";

    it("lists direct dependents", async () => {
      const { io, out } = memoryIo({ "doc.txt": doc });
      await runCli(["deps", "doc.txt", "1"], io);
      expect(out).toEqual(["2"]);
    });

    it("lists transitive dependents", async () => {
      const { io, out } = memoryIo({ "doc.txt": doc });
      await runCli(["deps", "doc.txt", "1", "--transitive"], io);
      expect(out).toEqual(["2\n3"]);
    });
  });

  describe("deps after evaluation", () => {
    it("numbers lines the way references do", async () => {
      const { io, out } = memoryIo({
        "doc.txt": ["10.0.0.0/24 = Network: 10.0.0.0/24", "> Mask: 255.255.255.0", "100 = 100", "\\2 * 2 = 200"].join("\n"),
      });
      await runCli(["deps", "doc.txt", "2"], io);
      expect(out).toEqual(["3"]);
    });
  });

  describe("values", () => {
    it("inlines referenced values", async () => {
      const { io, out } = memoryIo({ "doc.txt": "$100 =\n\\1 * 2 =" });
      await runCli(["values", "doc.txt"], io);
      expect(out).toEqual(["$100 =\n$100.00 * 2 ="]);
    });
  });
});
