import ora, { type Ora } from "ora";

let current: Ora | null = null;

// Progress goes to stderr so `--format json` output on stdout stays parseable.
export function startStep(text: string): void {
  current?.stop();
  current = ora({ text, stream: process.stderr }).start();
}

export function succeedStep(text?: string): void {
  current?.succeed(text);
  current = null;
}

export function failStep(text?: string): void {
  current?.fail(text);
  current = null;
}
