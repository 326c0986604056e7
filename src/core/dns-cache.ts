import { isIP } from 'net';
import { ErrorKind, toDashboardError } from './errors';
import { getLogger } from '@utils/logger';

export interface DnsResolver {
  /** Short hostname for an address, or null when it has none */
  resolve(ip: string): Promise<string | null>;
}

const NEVER_RESOLVE = new Set(['localhost', '127.0.0.1', '::1']);

interface Resolution {
  ip: string;
  hostname: string | null;
}

/**
 * Bounded reverse-lookup cache fed by background lookups.
 *
 * Lookups only push onto a queue; `drain()` is the single consumer and is
 * called from the control loop, so the cache itself is only touched there.
 * Unresolved addresses are remembered as null and never retried.
 */
export class DnsCache {
  private readonly entries = new Map<string, string | null>();
  private readonly pending = new Set<string>();
  private queue: Resolution[] = [];

  constructor(
    private readonly resolver: DnsResolver,
    private readonly capacity = 1024,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Hostname if already resolved. Unknown addresses are scheduled and
   * return undefined until a later drain.
   */
  lookup(address: string): string | undefined {
    if (!isResolvable(address)) return undefined;
    if (this.entries.has(address)) return this.entries.get(address) ?? undefined;
    if (!this.pending.has(address)) this.schedule(address);
    return undefined;
  }

  /**
   * Move finished lookups into the cache. Returns how many produced a hostname.
   */
  drain(): number {
    if (this.queue.length === 0) return 0;
    const batch = this.queue;
    this.queue = [];
    let resolved = 0;
    for (const { ip, hostname } of batch) {
      this.pending.delete(ip);
      this.store(ip, hostname);
      if (hostname) resolved++;
    }
    return resolved;
  }

  private schedule(ip: string): void {
    this.pending.add(ip);
    void this.resolver.resolve(ip).then(
      hostname => {
        this.queue.push({ ip, hostname });
      },
      (error: unknown) => {
        const failure = toDashboardError(error, ErrorKind.Resolution);
        getLogger().debug(`Reverse lookup failed for ${ip}: ${failure.message}`);
        this.queue.push({ ip, hostname: null });
      },
    );
  }

  private store(ip: string, hostname: string | null): void {
    if (this.entries.size >= this.capacity && !this.entries.has(ip)) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(ip, hostname);
  }
}

export function isResolvable(address: string): boolean {
  return !NEVER_RESOLVE.has(address) && isIP(address) !== 0;
}
