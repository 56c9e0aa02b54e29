// ── Console Reporting ──

const useColor = (stream: NodeJS.WriteStream): boolean =>
  Boolean(stream.isTTY) && !process.env.NO_COLOR;

const paint = (code: string) => (s: string, stream: NodeJS.WriteStream = process.stdout) =>
  useColor(stream) ? `\x1b[${code}m${s}\x1b[0m` : s;

// ── ANSI colors ──
export const dim = paint("2");
export const red = paint("31");
export const green = paint("32");
export const bold = paint("1");

export interface Reporter {
  info(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info(message) {
    console.log(message);
  },
  error(message) {
    console.error(red("✗", process.stderr), message);
  },
};

// Collects lines instead of printing them
export function memoryReporter(): Reporter & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info(message) {
      lines.push(message);
    },
    error(message) {
      lines.push(`error: ${message}`);
    },
  };
}
