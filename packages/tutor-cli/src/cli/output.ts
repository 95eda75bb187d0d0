// Terminal output helpers for the tutor CLI

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Colors are disabled when false */
  color: boolean;
}

type Paint = (text: string) => string;

function ansi(code: number): Paint {
  return text => `\x1b[${code}m${text}\x1b[0m`;
}

export const colors = {
  red: ansi(31),
  green: ansi(32),
  yellow: ansi(33),
  cyan: ansi(36),
  gray: ansi(90),
  bold: ansi(1),
};

export type ColorName = keyof typeof colors;

export function paint(io: CliIO, color: ColorName, text: string): string {
  return io.color ? colors[color](text) : text;
}

export function formatTiming(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function keyValue(io: CliIO, key: string, value: string | number): string {
  return `${paint(io, 'cyan', key)}: ${value}`;
}

export function processIO(): CliIO {
  return {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
    color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
  };
}
