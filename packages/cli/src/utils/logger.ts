import pc from "picocolors";

type PicoColor = {
  [K in keyof typeof pc]: (typeof pc)[K] extends (str: string) => string
    ? K
    : never;
}[keyof typeof pc];

export const log = {
  error(...messages: string[]) {
    console.error(pc.red(messages.join(" ")));
  },
  warn(...messages: string[]) {
    console.warn(pc.yellow(messages.join(" ")));
  },
  success(...messages: string[]) {
    console.log(pc.green(messages.join(" ")));
  },
  info(...messages: string[]) {
    console.log(messages.join(" "));
  },
  debug(...messages: string[]) {
    console.log(pc.dim(messages.join(" ")));
  },
  color(color: PicoColor, ...messages: string[]) {
    console.log(pc[color](messages.join(" ")));
  },
  banner(title: string) {
    const rule = "#".repeat(Math.max(title.length + 16, 60));
    console.log(pc.cyan(rule));
    console.log(pc.cyan(`#       ${title}`));
    console.log(pc.cyan(rule));
  },
  phase(title: string) {
    console.log(pc.bold(pc.cyan(`############# ${title} #############`)));
  },
};

export type LogLevel = "info" | "error" | "warn" | "debug";

/**
 * Logger scoped to one architecture or host. Every line is prefixed so that
 * interleaved output from concurrent builds stays readable.
 */
export function createScopedLogger(scope: string) {
  const write = (level: LogLevel, message: string) => {
    const prefix = `[${level.toUpperCase()}][${scope}]`;
    if (level === "error") {
      console.error(pc.red(`${prefix} ${message}`));
    } else if (level === "warn") {
      console.warn(pc.yellow(`${prefix} ${message}`));
    } else if (level === "debug") {
      console.log(pc.dim(`${prefix} ${message}`));
    } else {
      console.log(`${pc.cyan(prefix)} ${message}`);
    }
  };

  return {
    info: (message: string) => write("info", message),
    error: (message: string) => write("error", message),
    warn: (message: string) => write("warn", message),
    debug: (message: string) => write("debug", message),
  };
}

export type Logger = ReturnType<typeof createScopedLogger>;
