import { createInterface } from "readline/promises";
import { InteractiveLoginRequiredError } from "../core/errors";

export interface LoginPrompt {
  loginUrl: string;
  cookiesPath: string;
}

/** Lets the pipeline pause until a human has finished logging in. */
export interface OperatorSignal {
  /** False when nobody is there to log in; callers must not open a login window. */
  readonly interactive: boolean;
  waitForLogin(prompt: LoginPrompt, signal?: AbortSignal): Promise<void>;
}

export class TerminalOperatorSignal implements OperatorSignal {
  readonly interactive = true;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {}

  async waitForLogin(prompt: LoginPrompt, signal?: AbortSignal): Promise<void> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      this.output.write(
        `\nNo session cookies at ${prompt.cookiesPath}.\n` +
          `Log in to ${prompt.loginUrl} in the browser window that just opened.\n`
      );
      await rl.question("Press ENTER once the home feed is visible... ", { signal });
    } finally {
      rl.close();
    }
  }
}

/** For unattended callers such as the HTTP API, where nobody can log in. */
export class UnattendedOperatorSignal implements OperatorSignal {
  readonly interactive = false;

  async waitForLogin(prompt: LoginPrompt): Promise<void> {
    throw new InteractiveLoginRequiredError(
      `No session cookies at ${prompt.cookiesPath}; run "top-posts auth:login" first`
    );
  }
}
