/**
 * Test helper: in-process CommandRunner with scripted responses.
 *
 * Rules match on the start of the formatted command line
 * (`docker compose -f … up -d`). The most recently added matching rule wins;
 * its responses are consumed in order and the last one repeats.
 * Unmatched commands succeed with empty output.
 */

import type { CommandOptions, CommandResult, CommandRunner } from "../exec/runner.js";
import { formatCommand } from "../exec/runner.js";

export interface RecordedCall {
  command: string;
  args: string[];
  line: string;
  options: CommandOptions;
}

export type FakeResponse =
  | Partial<CommandResult>
  | ((call: RecordedCall) => Partial<CommandResult> | Promise<Partial<CommandResult>>);

interface Rule {
  prefix: string;
  responses: FakeResponse[];
  used: number;
}

export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Rule[] = [];

  on(prefix: string, ...responses: FakeResponse[]): this {
    this.rules.unshift({ prefix, responses: responses.length > 0 ? responses : [{}], used: 0 });
    return this;
  }

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args: [...args], line: formatCommand(command, args), options };
    this.calls.push(call);

    const rule = this.rules.find(r => call.line.startsWith(r.prefix));
    if (!rule) return { exitCode: 0, stdout: "", stderr: "" };

    const response = rule.responses[Math.min(rule.used, rule.responses.length - 1)] ?? {};
    rule.used++;
    const result = typeof response === "function" ? await response(call) : response;
    return { exitCode: 0, stdout: "", stderr: "", ...result };
  }

  /** Formatted command lines, in call order. */
  lines(): string[] {
    return this.calls.map(c => c.line);
  }

  /** Formatted lines of calls starting with `prefix`. */
  linesStartingWith(prefix: string): string[] {
    return this.lines().filter(l => l.startsWith(prefix));
  }
}
