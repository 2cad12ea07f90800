import { promises as dns } from 'dns';
import { DNS_PROBE_HOST, HTTP_PROBE_MAX_STATUS, HTTP_PROBE_SITES } from '../constants/network.js';
import { withTimeout } from '../utils/security.js';

export interface ConnectivityProbe {
  name: string;
  check: (timeoutMs: number) => Promise<boolean>;
}

export const httpProbe = (
  sites: readonly string[] = HTTP_PROBE_SITES,
  fetchFn: typeof fetch = fetch
): ConnectivityProbe => ({
  name: 'HTTP',
  check: async (timeoutMs) => {
    for (const site of sites) {
      // An unreachable site just moves on to the next one.
      const response = await fetchFn(site, { method: 'HEAD', signal: AbortSignal.timeout(timeoutMs) }).catch(
        () => null
      );
      if (response && response.status < HTTP_PROBE_MAX_STATUS) return true;
    }
    return false;
  },
});

export const dnsProbe = (
  host: string = DNS_PROBE_HOST,
  resolve: (hostname: string) => Promise<string[]> = (hostname) => dns.resolve4(hostname)
): ConnectivityProbe => ({
  name: 'DNS',
  check: async (timeoutMs) => {
    const addresses = await withTimeout(resolve(host), timeoutMs);
    return addresses.length > 0;
  },
});

export const DEFAULT_PROBES: ConnectivityProbe[] = [httpProbe(), dnsProbe()];

export interface ProbeReport {
  name: string;
  connected: boolean;
  error?: string;
}

const runProbe = async (probe: ConnectivityProbe, timeoutMs: number): Promise<ProbeReport> => {
  try {
    return { name: probe.name, connected: await probe.check(timeoutMs) };
  } catch (error) {
    return {
      name: probe.name,
      connected: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
};

export class ConnectivityChecker {
  constructor(
    private readonly timeoutMs: number,
    private readonly probes: ConnectivityProbe[] = DEFAULT_PROBES
  ) {}

  /** Name of the first probe that reached the internet, or null. */
  check = async (): Promise<string | null> => {
    for (const probe of this.probes) {
      const report = await runProbe(probe, this.timeoutMs);
      if (report.connected) return report.name;
    }
    return null;
  };

  probeAll = async (): Promise<ProbeReport[]> => {
    const reports: ProbeReport[] = [];
    for (const probe of this.probes) {
      reports.push(await runProbe(probe, this.timeoutMs));
    }
    return reports;
  };
}
