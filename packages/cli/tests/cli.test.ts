/**
 * Tests for the `tally` command.
 */

import { open } from "node:fs/promises";
import { describe, it, expect, vi } from "vitest";
import { run } from "../src/cli.js";
import { ExitCodes } from "../src/exit-codes.js";
import { fixture, memoryIo } from "./helpers.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, open: vi.fn(actual.open) };
});

const HEADER = "client,available,held,total,locked\n";

async function tally(args: string[], env: Record<string, string | undefined> = {}) {
  const io = memoryIo(env);
  const code = await run(["node", "tally", ...args], io);
  return { code, io };
}

// ─── Scenarios ──────────────────────────────────────────────────────────

describe("tally replay", () => {
  it("sums deposits per client", async () => {
    const { code, io } = await tally([fixture("deposit.csv")]);
    expect(code).toBe(ExitCodes.SUCCESS);
    expect(io.out()).toBe(
      HEADER + "1,3.0000,0.0000,3.0000,false\n" + "2,2.0000,0.0000,2.0000,false\n",
    );
  });

  it("ignores withdrawals beyond available funds", async () => {
    const { code, io } = await tally([fixture("withdrawal.csv")]);
    expect(code).toBe(ExitCodes.SUCCESS);
    expect(io.out()).toBe(
      HEADER + "1,5.0000,0.0000,5.0000,false\n" + "2,10.0000,0.0000,10.0000,false\n",
    );
  });

  it("holds disputed funds", async () => {
    const { io } = await tally([fixture("dispute.csv")]);
    expect(io.out()).toBe(
      HEADER +
        "1,5.0000,0.0000,5.0000,false\n" +
        "2,-40.0000,50.0000,10.0000,false\n" +
        "3,0.0000,50.0000,50.0000,false\n",
    );
  });

  it("releases resolved funds", async () => {
    const { io } = await tally([fixture("resolve.csv")]);
    expect(io.out()).toBe(HEADER + "1,75.0000,50.0000,125.0000,false\n");
  });

  it("locks the account on chargeback", async () => {
    const { io } = await tally([fixture("chargeback.csv")]);
    expect(io.out()).toBe(HEADER + "1,35.0000,50.0000,85.0000,true\n");
  });

  it("skips blank lines", async () => {
    const { io } = await tally([fixture("blank-lines.csv")]);
    expect(io.out()).toBe(HEADER + "7,0.0001,0.0000,0.0001,false\n");
  });

  it("skips rows with broken quoting or extra fields", async () => {
    const { code, io } = await tally([fixture("bad-rows.csv")]);
    expect(code).toBe(ExitCodes.SUCCESS);
    expect(io.out()).toBe(
      HEADER + "1,7.5000,0.0000,7.5000,false\n" + "2,7.0000,0.0000,7.0000,false\n",
    );
    expect(io.logs.filter((l) => l["msg"] === "Rejected transaction row")).toHaveLength(2);
  });

  it("writes nothing to stdout but the report when rows are rejected", async () => {
    const { code, io } = await tally([fixture("malformed.csv")]);
    expect(code).toBe(ExitCodes.SUCCESS);
    expect(io.out()).toBe(HEADER + "1,1.0000,0.0000,1.0000,false\n");
    expect(io.logs.filter((l) => l["msg"] === "Rejected transaction row")).toHaveLength(5);
  });
});

// ─── Options ────────────────────────────────────────────────────────────

describe("tally options", () => {
  it("writes JSON with --format json", async () => {
    const { code, io } = await tally(["--format", "json", fixture("resolve.csv")]);
    expect(code).toBe(ExitCodes.SUCCESS);
    expect(JSON.parse(io.out())).toEqual([
      { client: 1, available: "75.0000", held: "50.0000", total: "125.0000", locked: false },
    ]);
  });

  it("rejects an unknown format", async () => {
    const { code, io } = await tally(["--format", "xml", fixture("deposit.csv")]);
    expect(code).toBe(ExitCodes.INVALID_ARGS);
    expect(io.out()).toBe("");
    expect(io.err()).toMatch(/^error: format: /);
  });

  it("lets --log-level override LOG_LEVEL", async () => {
    const { io } = await tally(["--log-level", "info", fixture("deposit.csv")], {
      LOG_LEVEL: "silent",
    });
    expect(io.logs.map((l) => l["msg"])).toContain("Replay complete");
  });

  it("logs nothing at the default level for a clean log", async () => {
    const { io } = await tally([fixture("deposit.csv")]);
    expect(io.logs).toEqual([]);
  });

  it("rejects an unknown --log-level", async () => {
    const { code } = await tally(["--log-level", "loud", fixture("deposit.csv")]);
    expect(code).toBe(ExitCodes.INVALID_ARGS);
  });
});

// ─── Failures ───────────────────────────────────────────────────────────

describe("tally failures", () => {
  it("exits 1 without a transaction file", async () => {
    const { code, io } = await tally([]);
    expect(code).toBe(ExitCodes.GENERAL_ERROR);
    expect(io.out()).toBe("");
    expect(io.err()).toContain("missing required argument 'transactions'");
  });

  it("exits 4 for a missing file", async () => {
    const path = fixture("nope.csv");
    const { code, io } = await tally([path]);
    expect(code).toBe(ExitCodes.NOT_FOUND);
    expect(io.out()).toBe("");
    expect(io.logs).toHaveLength(1);
    expect(io.logs[0]).toMatchObject({
      level: 50,
      code: "NOT_FOUND",
      path,
      msg: `Transaction file not found: ${path}`,
    });
  });

  it("exits 4 for a file that cannot be opened", async () => {
    const path = fixture("deposit.csv");
    vi.mocked(open).mockRejectedValueOnce(
      Object.assign(new Error(`EACCES: permission denied, open '${path}'`), { code: "EACCES" }),
    );
    const { code, io } = await tally([path]);
    expect(code).toBe(ExitCodes.NOT_FOUND);
    expect(io.out()).toBe("");
    expect(io.logs[0]).toMatchObject({
      level: 50,
      code: "UNREADABLE",
      msg: `Transaction file is not readable: ${path}`,
    });
  });

  it("exits 11 for invalid configuration", async () => {
    const { code, io } = await tally([fixture("deposit.csv")], { LOG_LEVEL: "loud" });
    expect(code).toBe(ExitCodes.CONFIG_ERROR);
    expect(io.err()).toMatch(/^error: invalid configuration: LOG_LEVEL: /);
  });

  it("exits 0 for --version", async () => {
    const { code, io } = await tally(["--version"]);
    expect(code).toBe(ExitCodes.SUCCESS);
    expect(io.out()).toBe("0.1.0\n");
  });
});
