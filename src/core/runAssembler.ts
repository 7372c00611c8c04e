import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { rulesFor } from "./dialects.js";
import { InvalidArgumentError, MalformedHopLineError, UnresolvedHostError } from "./errors.js";
import { parseHopLine } from "./hopParser.js";
import type { Dialect, HopRecord, RunResult } from "./types.js";

const UNRESOLVED_HOST_MARKER = "name or service not known";
const INVALID_ARGUMENT_MARKER = "invalid argument";

/** Yields decoded probe output lines in arrival order, `null` at end of stream. */
export interface LineSource {
  readLine(): Promise<string | null>;
  /** Detaches from the underlying input; called once the run is over. */
  close?(): void;
}

export interface AssembleRunOptions {
  target: string;
  command: string;
  dialect: Dialect;
  expectedTries: number;
  now?: () => Date;
  /** Receives the banner and each hop line as it is read. */
  echo?: (line: string) => void;
}

export function lineSourceFromText(text: string): LineSource {
  const lines = text.split(/\r?\n/);
  let position = 0;

  return {
    readLine: async () => {
      if (position >= lines.length) {
        return null;
      }
      const line = lines[position] ?? null;
      position += 1;
      return line;
    },
  };
}

export function lineSourceFromStream(stream: Readable): LineSource {
  const reader = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
  const iterator = reader[Symbol.asyncIterator]();
  let closed = false;

  const close = (): void => {
    if (closed) {
      return;
    }
    closed = true;
    reader.close();
  };

  return {
    readLine: async () => {
      if (closed) {
        return null;
      }
      const next = await iterator.next();
      if (next.done) {
        close();
        return null;
      }
      return next.value;
    },
    close,
  };
}

export function hasPathData(run: RunResult): boolean {
  return run.hops.length > 0;
}

/**
 * Reads one probe run: a banner line, then hop lines until a blank line or the
 * end of the stream. The duration covers the hop lines only.
 */
export async function assembleRun(
  source: LineSource,
  options: AssembleRunOptions,
): Promise<RunResult> {
  try {
    rulesFor(options.dialect);
    return await readRun(source, options);
  } finally {
    source.close?.();
  }
}

async function readRun(source: LineSource, options: AssembleRunOptions): Promise<RunResult> {
  const now = options.now ?? (() => new Date());
  const echo = options.echo;

  const timestamp = now().toISOString();
  const description = ((await source.readLine()) ?? "").trim();
  echo?.(description);

  if (description.toLowerCase().includes(UNRESOLVED_HOST_MARKER)) {
    throw new UnresolvedHostError(options.target, description);
  }

  const hops: HopRecord[] = [];
  const startedAtMs = now().getTime();
  let lastIndex = 0;

  while (true) {
    const raw = await source.readLine();
    const line = raw?.trim() ?? "";

    if (line.toLowerCase().includes(INVALID_ARGUMENT_MARKER)) {
      throw new InvalidArgumentError(line);
    }
    if (!line) {
      break;
    }

    echo?.(line);
    const hop = parseHopLine(line, options.dialect, options.expectedTries);
    if (hops.length > 0 && hop.index <= lastIndex) {
      throw new MalformedHopLineError(
        line,
        `Hop index ${hop.index} does not follow ${lastIndex}`,
      );
    }
    lastIndex = hop.index;
    hops.push(hop);
  }

  const durationSeconds = Math.max(0, (now().getTime() - startedAtMs) / 1000);

  return {
    target: options.target,
    command: options.command,
    description,
    timestamp,
    durationSeconds,
    hops,
  };
}
