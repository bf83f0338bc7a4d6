import { createInterface } from "node:readline";
import { Writable } from "node:stream";

export const PASSWORD_ENV = "PASSWORD";

/** Prompt on stderr without echoing what is typed. */
function promptHidden(prompt: string): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) process.stderr.write(chunk);
      callback();
    },
  });

  const rl = createInterface({ input: process.stdin, output, terminal: true });

  return new Promise((resolve, reject) => {
    rl.on("SIGINT", () => {
      rl.close();
      reject(new Error("Password prompt interrupted"));
    });
    rl.question(prompt, (answer) => {
      rl.close();
      process.stderr.write("\n");
      resolve(answer);
    });
    muted = true;
  });
}

/**
 * Password from the environment, else asked for interactively when stdin is
 * a terminal. Empty when neither is available.
 */
export async function getPassword(env: string = PASSWORD_ENV): Promise<string> {
  const fromEnv = process.env[env];
  if (fromEnv) return fromEnv;

  if (!process.stdin.isTTY) return "";

  return promptHidden("Password: ");
}
