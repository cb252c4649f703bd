import { validateConfig } from "../config/env.js";
import type { Config } from "../config/types.js";
import { ConfigurationError } from "../errors.js";

export const COMMANDS = ["run", "collect", "summarize", "login", "config"] as const;
export type Command = (typeof COMMANDS)[number];

export type Args = {
  command: Command;
  user?: string;
  hours?: number;
  corpusPath?: string;
  summaryPath?: string;
  maxScrolls?: number;
  chunkBytes?: number;
  model?: string;
};

function parseNumber(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigurationError(`Invalid ${flag} '${value}'. Expected a number.`);
  }
  return n;
}

export function parseArgs(argv: string[]): Args {
  const args: Args = { command: "run" };
  let i = 0;

  const first = argv[0];
  if (first && !first.startsWith("--")) {
    const command = COMMANDS.find((candidate) => candidate === first);
    if (!command) {
      throw new ConfigurationError(`Unknown command '${first}'. Expected ${COMMANDS.join("|")}.`);
    }
    args.command = command;
    i = 1;
  }

  for (; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === "--user" && value) {
      args.user = value;
      i++;
    } else if (arg === "--hours" && value) {
      args.hours = parseNumber(arg, value);
      i++;
    } else if (arg === "--corpus" && value) {
      args.corpusPath = value;
      i++;
    } else if (arg === "--summary" && value) {
      args.summaryPath = value;
      i++;
    } else if (arg === "--max-scrolls" && value) {
      args.maxScrolls = parseNumber(arg, value);
      i++;
    } else if (arg === "--chunk-bytes" && value) {
      args.chunkBytes = parseNumber(arg, value);
      i++;
    } else if (arg === "--model" && value) {
      args.model = value;
      i++;
    } else {
      throw new ConfigurationError(`Unknown or incomplete argument: ${arg}`);
    }
  }

  return args;
}

/** Flags win over environment values. */
export function applyArgs(cfg: Config, args: Args): Config {
  const user = args.user ?? cfg.source.user;
  const next: Config = {
    ...cfg,
    source: { ...cfg.source, user },
    collect: {
      ...cfg.collect,
      hoursBack: args.hours ?? cfg.collect.hoursBack,
      maxScrolls: args.maxScrolls ?? cfg.collect.maxScrolls,
    },
    output: {
      ...cfg.output,
      corpusPath: args.corpusPath ?? (args.user ? `${user}_last_hours.txt` : cfg.output.corpusPath),
      summaryPath: args.summaryPath ?? cfg.output.summaryPath,
    },
    chunk: { maxBytes: args.chunkBytes ?? cfg.chunk.maxBytes },
    llm: { ...cfg.llm, model: args.model ?? cfg.llm.model },
  };
  validateConfig(next);
  return next;
}
