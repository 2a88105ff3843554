import {
  InvalidPublicKeyError,
  type SupportedPayments,
  TransportError,
} from "@paykit/pubky";
import chalk from "chalk";
import { Command } from "commander";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import { registerListCommand } from "../../src/commands/list.js";

const mockGetPaymentList =
  vi.fn<(pubkey: string) => Promise<SupportedPayments>>();

vi.mock("../../src/config.js", () => ({
  createPaykitFromEnv: () => ({
    getPaymentList: mockGetPaymentList,
  }),
}));

const PAYEE = `${"p".repeat(51)}y`;

function noop(): void {}

function createProgram(): Command {
  const program = new Command();
  program.option("--json", "JSON output", false);
  registerListCommand(program);
  return program;
}

describe("list command", () => {
  let stdoutSpy: MockInstance<typeof process.stdout.write>;
  let stderrSpy: MockInstance<typeof process.stderr.write>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    chalk.level = 0;
    stdoutSpy = vi.spyOn(process.stdout, "write").mockReturnValue(true);
    stderrSpy = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    exitSpy = vi.spyOn(process, "exit").mockImplementation(noop as () => never);
    mockGetPaymentList.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should print a table of endpoints", async () => {
    mockGetPaymentList.mockResolvedValue(
      new Map([
        ["lightning", "lnurl1dp68gurn"],
        ["onchain", "bc1qtest"],
      ]),
    );

    await createProgram().parseAsync(["node", "paykit", "list", PAYEE]);

    expect(mockGetPaymentList).toHaveBeenCalledWith(PAYEE);
    const output = stdoutSpy.mock.calls.map((c) => c[0]).join("");
    expect(output).toContain(`Payment endpoints for ${PAYEE}`);
    expect(output).toContain(`  ${"lightning".padEnd(16)}lnurl1dp68gurn`);
    expect(output).toContain(`  ${"onchain".padEnd(16)}bc1qtest`);
    expect(output).toContain("2 endpoint(s)");
  });

  it("should say when nothing is published", async () => {
    mockGetPaymentList.mockResolvedValue(new Map());

    await createProgram().parseAsync(["node", "paykit", "list", PAYEE]);

    const output = stdoutSpy.mock.calls.map((c) => c[0]).join("");
    expect(output).toBe(`No payment endpoints published by ${PAYEE}.\n`);
  });

  it("should output the JSON envelope", async () => {
    mockGetPaymentList.mockResolvedValue(
      new Map([["lightning", "lnurl1dp68gurn"]]),
    );

    await createProgram().parseAsync([
      "node",
      "paykit",
      "--json",
      "list",
      PAYEE,
    ]);

    const output = stdoutSpy.mock.calls.map((c) => c[0]).join("");
    const parsed = JSON.parse(output);
    expect(parsed.success).toBe(true);
    expect(parsed.data).toEqual({ lightning: "lnurl1dp68gurn" });
    expect(parsed.metadata.pubkey).toBe(PAYEE);
    expect(typeof parsed.metadata.duration).toBe("number");
  });

  it("should exit with code 3 on an invalid key", async () => {
    mockGetPaymentList.mockRejectedValue(
      new InvalidPublicKeyError("bogus", "expected 52 characters, got 5"),
    );

    await createProgram().parseAsync(["node", "paykit", "list", "bogus"]);

    expect(exitSpy).toHaveBeenCalledWith(3);
    const output = stderrSpy.mock.calls.map((c) => c[0]).join("");
    expect(output).toContain(
      'Error: Invalid public key "bogus": expected 52 characters, got 5',
    );
  });

  it("should report transport failures as JSON errors", async () => {
    mockGetPaymentList.mockRejectedValue(
      new TransportError("get_payment_list: list endpoints: LIST failed"),
    );

    await createProgram().parseAsync([
      "node",
      "paykit",
      "--json",
      "list",
      PAYEE,
    ]);

    expect(exitSpy).toHaveBeenCalledWith(5);
    const output = stdoutSpy.mock.calls.map((c) => c[0]).join("");
    expect(JSON.parse(output)).toEqual({
      success: false,
      error: {
        code: "transport",
        message: "get_payment_list: list endpoints: LIST failed",
      },
    });
  });
});
