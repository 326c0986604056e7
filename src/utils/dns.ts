import { promises as dns } from 'dns';
import type { DnsResolver } from '@core/dns-cache';

/** Reverse lookups give up after this long */
const LOOKUP_TIMEOUT_MS = 1000;

/**
 * `db-01.prod.example.com.` becomes `db-01`
 */
export function shortHostname(name: string): string {
  return name.replace(/\.$/, '').split('.')[0] ?? name;
}

/**
 * PTR lookups through the system resolver
 */
export class SystemDnsResolver implements DnsResolver {
  private readonly resolver = new dns.Resolver({ timeout: LOOKUP_TIMEOUT_MS, tries: 1 });

  async resolve(ip: string): Promise<string | null> {
    const names = await this.resolver.reverse(ip);
    const first = names[0];
    return first ? shortHostname(first) || null : null;
  }
}
