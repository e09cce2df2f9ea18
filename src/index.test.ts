import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type MockInstance,
} from "vitest";
import { ConfigurationError, UnknownSignalError } from "./errors.js";
import {
  collectRecords,
  isAbortError,
  noMatchesMessage,
  parseArgs,
  parsePort,
  resolveOptions,
  run,
  type CliFlags,
  type RunOptions,
} from "./index.js";
import type {
  Listener,
  PlatformAdapter,
  ProcessSnapshotEntry,
} from "./platform/index.js";
import { Sampler } from "./sampler.js";
import { resolveSignal } from "./signals.js";

describe("parseArgs", () => {
  // Helper to simulate argv (node, script path, then args)
  const argv = (...args: string[]) => ["node", "reap.js", ...args];

  it("returns defaults when no arguments are provided", () => {
    expect(parseArgs(argv())).toEqual({
      filter: null,
      signal: "KILL",
      sort: "cpu",
      live: false,
      ports: false,
      port: null,
      interval: 2,
      confirmNuke: false,
    });
  });

  it("parses --filter and its -f shorthand", () => {
    expect(parseArgs(argv("--filter", "chrome")).filter).toBe("chrome");
    expect(parseArgs(argv("-f", "node")).filter).toBe("node");
  });

  it("parses --signal and its -s shorthand", () => {
    expect(parseArgs(argv("--signal", "TERM")).signal).toBe("TERM");
    expect(parseArgs(argv("-s", "hup")).signal).toBe("hup");
  });

  it("parses --sort", () => {
    expect(parseArgs(argv("--sort", "pid")).sort).toBe("pid");
  });

  it("parses --live and --interval", () => {
    const result = parseArgs(argv("-l", "--interval", "0.5"));

    expect(result.live).toBe(true);
    expect(result.interval).toBe(0.5);
  });

  it("parses port flags", () => {
    expect(parseArgs(argv("-p")).ports).toBe(true);
    expect(parseArgs(argv("--port", "3000")).port).toBe("3000");
  });

  it("parses --confirm-nuke", () => {
    expect(parseArgs(argv("-f", "chrome", "--confirm-nuke")).confirmNuke).toBe(
      true,
    );
  });

  it("ignores unknown flags", () => {
    const result = parseArgs(argv("--unknown", "-f", "vim"));

    expect(result.filter).toBe("vim");
  });
});

describe("parsePort", () => {
  it("parses valid ports", () => {
    expect(parsePort("1")).toBe(1);
    expect(parsePort(" 3000 ")).toBe(3000);
    expect(parsePort("65535")).toBe(65535);
  });

  it("rejects non-numeric input", () => {
    expect(() => parsePort("abc")).toThrow("Invalid port number: abc");
    expect(() => parsePort("80.5")).toThrow(ConfigurationError);
  });

  it("rejects ports out of range", () => {
    expect(() => parsePort("0")).toThrow("Port out of range (1-65535): 0");
    expect(() => parsePort("70000")).toThrow(
      "Port out of range (1-65535): 70000",
    );
  });
});

const flags = (overrides: Partial<CliFlags> = {}): CliFlags => ({
  filter: null,
  signal: "KILL",
  sort: "cpu",
  live: false,
  ports: false,
  port: null,
  interval: 2,
  confirmNuke: false,
  ...overrides,
});

describe("resolveOptions", () => {
  it("resolves signal, sort key and interval", () => {
    const options = resolveOptions(
      flags({ signal: "sigterm", sort: "mem", interval: 0.5 }),
    );

    expect(options).toEqual({
      filter: null,
      signal: { name: "SIGTERM", number: 15 },
      sort: "memory",
      live: false,
      portMode: false,
      port: null,
      refreshIntervalMs: 500,
      confirmNuke: false,
    });
  });

  it("turns on port mode for an exact port", () => {
    const options = resolveOptions(flags({ port: "8080" }));

    expect(options.portMode).toBe(true);
    expect(options.port).toBe(8080);
  });

  it("rejects unknown signals", () => {
    expect(() => resolveOptions(flags({ signal: "BOGUS" }))).toThrow(
      UnknownSignalError,
    );
  });

  it("rejects unknown sort keys", () => {
    expect(() => resolveOptions(flags({ sort: "size" }))).toThrow(
      ConfigurationError,
    );
  });

  it("rejects live mode combined with a batch kill", () => {
    expect(() =>
      resolveOptions(flags({ live: true, confirmNuke: true, filter: "chrome" })),
    ).toThrow("--live cannot be combined with --confirm-nuke");
  });

  it("rejects non-positive intervals", () => {
    expect(() => resolveOptions(flags({ interval: 0 }))).toThrow(
      "Invalid refresh interval: 0 (expected seconds > 0)",
    );
    expect(() => resolveOptions(flags({ interval: Number.NaN }))).toThrow(
      ConfigurationError,
    );
  });
});

class FakePlatform implements PlatformAdapter {
  snapshot = vi.fn(async (): Promise<ProcessSnapshotEntry[]> => [
    { pid: 200, name: "chrome", cpuTimeMs: 0, rssBytes: 0 },
    { pid: 150, name: "chrome", cpuTimeMs: 0, rssBytes: 0 },
    { pid: 300, name: "Chrome Helper", cpuTimeMs: 0, rssBytes: 0 },
    { pid: 400, name: "node", cpuTimeMs: 0, rssBytes: 0 },
  ]);

  listListeners = vi.fn((): Listener[] => [
    { pid: 400, port: 3000, protocol: "TCP" },
    { pid: 400, port: 3001, protocol: "TCP" },
    { pid: 200, port: 9222, protocol: "TCP" },
  ]);

  sendSignal = vi.fn((_pid: number, _signal: NodeJS.Signals) => {});
}

const options = (overrides: Partial<RunOptions> = {}): RunOptions => ({
  filter: null,
  signal: resolveSignal("TERM"),
  sort: "pid",
  live: false,
  portMode: false,
  port: null,
  refreshIntervalMs: 2000,
  confirmNuke: false,
  ...overrides,
});

describe("run", () => {
  let platform: FakePlatform;
  let sampler: Sampler;
  let logMock: MockInstance<typeof console.log>;

  beforeEach(() => {
    platform = new FakePlatform();
    sampler = new Sampler(platform, platform, { sleep: async () => {} });
    logMock = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects a batch kill without filter or port before sampling", async () => {
    await expect(
      run(options({ confirmNuke: true }), platform, sampler),
    ).rejects.toThrow(ConfigurationError);

    expect(platform.snapshot).not.toHaveBeenCalled();
    expect(platform.sendSignal).not.toHaveBeenCalled();
  });

  it("rejects live mode without a terminal before sampling", async () => {
    const original = Object.getOwnPropertyDescriptor(process.stdin, "isTTY");
    Object.defineProperty(process.stdin, "isTTY", {
      value: false,
      configurable: true,
    });

    try {
      await expect(
        run(options({ live: true }), platform, sampler),
      ).rejects.toThrow("--live requires an interactive terminal");
      expect(platform.snapshot).not.toHaveBeenCalled();
    } finally {
      if (original) {
        Object.defineProperty(process.stdin, "isTTY", original);
      } else {
        Reflect.deleteProperty(process.stdin, "isTTY");
      }
    }
  });

  it("signals every filtered process in a batch kill", async () => {
    const code = await run(
      options({ confirmNuke: true, filter: "chrome" }),
      platform,
      sampler,
    );

    expect(code).toBe(0);
    expect(platform.sendSignal.mock.calls).toEqual([
      [150, "SIGTERM"],
      [200, "SIGTERM"],
      [300, "SIGTERM"],
    ]);
  });

  it("signals a process owning several matching ports once", async () => {
    const code = await run(
      options({ confirmNuke: true, filter: "node", portMode: true }),
      platform,
      sampler,
    );

    expect(code).toBe(0);
    expect(platform.sendSignal.mock.calls).toEqual([[400, "SIGTERM"]]);
  });

  it("limits a port batch kill to the owner of that port", async () => {
    await run(
      options({ confirmNuke: true, portMode: true, port: 9222 }),
      platform,
      sampler,
    );

    expect(platform.sendSignal.mock.calls).toEqual([[200, "SIGTERM"]]);
  });

  it("attempts every target and exits 1 when one fails", async () => {
    platform.sendSignal.mockImplementation((pid: number) => {
      if (pid === 150) {
        throw Object.assign(new Error("Operation not permitted"), {
          code: "EPERM",
        });
      }
    });

    const code = await run(
      options({ confirmNuke: true, filter: "chrome" }),
      platform,
      sampler,
    );

    expect(code).toBe(1);
    expect(platform.sendSignal).toHaveBeenCalledTimes(3);
  });

  it("reports no matches without signalling", async () => {
    const code = await run(
      options({ confirmNuke: true, filter: "nothing-matches" }),
      platform,
      sampler,
    );

    expect(code).toBe(0);
    expect(logMock).toHaveBeenCalledWith("No processes found");
    expect(platform.sendSignal).not.toHaveBeenCalled();
  });

  it("reports an empty port listing when listeners cannot be read", async () => {
    platform.listListeners.mockImplementation(() => {
      throw new Error("lsof: permission denied");
    });

    const code = await run(
      options({ confirmNuke: true, portMode: true, port: 3000 }),
      platform,
      sampler,
    );

    expect(code).toBe(0);
    expect(logMock).toHaveBeenCalledWith(
      "No process found listening on port 3000",
    );
  });
});

describe("collectRecords", () => {
  it("samples with ports and sorts by port in port mode", async () => {
    const platform = new FakePlatform();
    const sampler = new Sampler(platform, platform, { sleep: async () => {} });

    const records = await collectRecords(
      sampler,
      options({ portMode: true, sort: "port" }),
    );

    expect(records.map((r) => [r.pid, r.port])).toEqual([
      [400, 3000],
      [400, 3001],
      [200, 9222],
    ]);
  });
});

describe("noMatchesMessage", () => {
  it("describes what was searched for", () => {
    expect(noMatchesMessage(options())).toBe("No processes found");
    expect(noMatchesMessage(options({ portMode: true }))).toBe(
      "No listening TCP processes found",
    );
    expect(noMatchesMessage(options({ portMode: true, port: 80 }))).toBe(
      "No process found listening on port 80",
    );
  });
});

describe("isAbortError", () => {
  it("recognises aborted prompts by name or code", () => {
    expect(isAbortError(Object.assign(new Error("x"), { name: "AbortError" }))).toBe(true);
    expect(isAbortError(Object.assign(new Error("x"), { code: "ABORT_ERR" }))).toBe(true);
  });

  it("does not treat other failures that mention aborting as cancels", () => {
    expect(isAbortError(new Error("lsof aborted: out of memory"))).toBe(false);
    expect(isAbortError("abort")).toBe(false);
  });
});
