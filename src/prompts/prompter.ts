/**
 * Interactive questions asked during lifecycle operations.
 *
 * `--quiet` swaps in NonInteractivePrompter so automation never blocks on a
 * terminal read.
 */

import { confirm, input, password } from "@inquirer/prompts";
import { ValidationError } from "../errors.js";

export interface Prompter {
  readonly interactive: boolean;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  /** Free text; `defaultValue` is returned for an empty answer. */
  input(message: string, defaultValue?: string): Promise<string>;
  /** Masked input for tokens. */
  secret(message: string): Promise<string>;
}

export class InquirerPrompter implements Prompter {
  readonly interactive = true;

  confirm(message: string, defaultValue?: boolean): Promise<boolean> {
    return confirm({ message, default: defaultValue });
  }

  async input(message: string, defaultValue?: string): Promise<string> {
    const answer = await input({ message, default: defaultValue });
    return answer.trim();
  }

  async secret(message: string): Promise<string> {
    const answer = await password({ message, mask: "*" });
    return answer.trim();
  }
}

export class NonInteractivePrompter implements Prompter {
  readonly interactive = false;

  confirm(message: string): Promise<boolean> {
    return Promise.reject(refuse(message));
  }

  input(message: string): Promise<string> {
    return Promise.reject(refuse(message));
  }

  secret(message: string): Promise<string> {
    return Promise.reject(refuse(message));
  }
}

/** Collect `KEY=value` lines until a blank answer. */
export async function askEnvironment(prompter: Prompter): Promise<string[]> {
  const environment: string[] = [];
  for (;;) {
    const kv = await prompter.input("New environment variable (KEY=value, leave blank to finish)", "");
    if (!kv) return environment;
    environment.push(kv);
  }
}

function refuse(message: string): ValidationError {
  return new ValidationError(`Input required but running non-interactively (--quiet): ${message}`);
}
