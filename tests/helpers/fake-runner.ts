import type { CommandRunner, ExecOptions, ExecResult } from "../../src/core/runner.js";

export interface FakeCall {
  file: string;
  args: string[];
  options?: ExecOptions;
}

export interface FakeResponse {
  exitCode?: number;
  stdout?: string;
}

type Responder = (call: FakeCall) => FakeResponse | number;

/** Records every invocation; responses are matched by command-line prefix, last rule wins */
export class FakeRunner implements CommandRunner {
  readonly calls: FakeCall[] = [];
  private readonly rules: Array<{ prefix: string; respond: Responder }> = [];
  private readonly missing: Set<string>;
  /** Optional hook to simulate side effects (e.g. files a tool writes) */
  onExec?: (call: FakeCall) => void;

  constructor(options: { missingTools?: string[] } = {}) {
    this.missing = new Set(options.missingTools ?? []);
  }

  on(prefix: string, respond: Responder | FakeResponse | number): this {
    this.rules.push({
      prefix,
      respond: typeof respond === "function" ? respond : () => respond,
    });
    return this;
  }

  async exec(file: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    const call: FakeCall = { file, args, options };
    this.calls.push(call);
    this.onExec?.(call);

    const command = [file, ...args].join(" ");
    const rule = [...this.rules].reverse().find((r) => command.startsWith(r.prefix));
    const response = rule ? rule.respond(call) : 0;
    const normalized: FakeResponse = typeof response === "number" ? { exitCode: response } : response;
    const { exitCode = 0, stdout = "" } = normalized;
    return { command, exitCode, stdout, durationMs: 0 };
  }

  exists(name: string): boolean {
    return !this.missing.has(name);
  }

  /** Recorded command lines */
  commands(): string[] {
    return this.calls.map((c) => [c.file, ...c.args].join(" "));
  }
}
