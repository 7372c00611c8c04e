import type { HopRecord } from "./types.js";

/**
 * Collects address to hostname observations across runs. An address resolves
 * to a hostname only when every observation agrees.
 */
export class HostnameLedger {
  private readonly namesByAddress = new Map<string, Set<string>>();

  record(address: string, hostname: string): void {
    const names = this.namesByAddress.get(address) ?? new Set<string>();
    names.add(hostname);
    this.namesByAddress.set(address, names);
  }

  recordHop(hop: HopRecord): void {
    const [address] = hop.addresses;
    if (hop.addresses.length === 1 && address !== undefined && hop.hostname !== undefined) {
      this.record(address, hop.hostname);
    }
  }

  resolve(address: string): string | undefined {
    const names = this.namesByAddress.get(address);
    if (!names || names.size !== 1) {
      return undefined;
    }
    const [name] = names;
    return name;
  }
}
