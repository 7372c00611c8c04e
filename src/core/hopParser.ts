import { classifyToken, rulesFor } from "./dialects.js";
import { MalformedHopLineError, ProbeCountMismatchError } from "./errors.js";
import type { Dialect, HopRecord } from "./types.js";

const HOP_INDEX_PATTERN = /^\d+$/;

function splitTokens(line: string): string[] {
  return line.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * A name is kept only when it can be tied to a single address and says
 * something the address does not.
 */
function resolveHostname(addresses: string[], hostname: string | undefined): string | undefined {
  if (hostname === undefined || addresses.length === 0) {
    return hostname;
  }
  if (addresses.length > 1) {
    return undefined;
  }
  return addresses[0] === hostname ? undefined : hostname;
}

export function parseHopLine(
  line: string,
  dialect: Dialect,
  expectedTries: number,
): HopRecord {
  rulesFor(dialect);

  const [first, ...rest] = splitTokens(line);
  if (first === undefined || !HOP_INDEX_PATTERN.test(first)) {
    throw new MalformedHopLineError(line);
  }

  const addresses: string[] = [];
  const samples: number[] = [];
  let hostname: string | undefined;
  let timeouts = 0;
  let remaining = expectedTries;

  for (const token of rest) {
    const classified = classifyToken(token, dialect);
    switch (classified.kind) {
      case "timeout":
        timeouts += 1;
        remaining -= 1;
        break;
      case "address":
        if (!addresses.includes(classified.address)) {
          addresses.push(classified.address);
        }
        break;
      case "time":
        samples.push(classified.ms);
        remaining -= 1;
        break;
      case "name":
        hostname = classified.name;
        break;
      case "noise":
        break;
    }
  }

  if (remaining !== 0) {
    throw new ProbeCountMismatchError(line, expectedTries, expectedTries - remaining);
  }

  const record: HopRecord = {
    index: Number(first),
    addresses,
    samples,
    timeouts,
  };

  const resolvedHostname = resolveHostname(addresses, hostname);
  if (resolvedHostname !== undefined) {
    record.hostname = resolvedHostname;
  }

  return record;
}
