import { createInterface } from "node:readline";
import { Writable } from "node:stream";
import { CliError } from "./args.js";

type PasswordInput = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Read a password from stdin. On a terminal the prompt goes to stderr and
 * keystrokes are not echoed; piped input yields its first line.
 */
export function readPassword(prompt: string, input: PasswordInput = process.stdin): Promise<string> {
  if (input.isTTY !== true) return readFirstLine(input);

  return new Promise((resolvePromise, reject) => {
    let muted = false;
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) process.stderr.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input, output, terminal: true });

    rl.on("SIGINT", () => {
      rl.close();
      process.stderr.write("\n");
      reject(new CliError("Cancelled.", 130));
    });

    rl.question(prompt, (answer) => {
      rl.close();
      process.stderr.write("\n");
      resolvePromise(answer);
    });

    muted = true;
  });
}

function readFirstLine(input: PasswordInput): Promise<string> {
  return new Promise((resolvePromise) => {
    let first: string | null = null;
    const rl = createInterface({ input, terminal: false });

    rl.once("line", (line) => {
      first = line;
      rl.close();
    });
    rl.once("close", () => resolvePromise(first ?? ""));
  });
}
