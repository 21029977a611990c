import { lookup } from "node:dns/promises";
import { networkInterfaces } from "node:os";
import { type NetworkProbe } from "#/application/ports/network";

type InterfaceLister = typeof networkInterfaces;
type HostResolver = (host: string) => Promise<unknown>;

export const hasExternalIpv4 = (interfaces: ReturnType<InterfaceLister>) =>
  Object.values(interfaces).some((addresses) =>
    (addresses ?? []).some(
      (address) => address.family === "IPv4" && !address.internal,
    ),
  );

/**
 * The local network counts as up when a non-loopback IPv4 address exists and
 * the server host resolves within the timeout.
 */
export class DnsNetworkProbe implements NetworkProbe {
  private readonly listInterfaces: InterfaceLister;
  private readonly resolve: HostResolver;

  constructor(
    private readonly deps: {
      timeoutMs: number;
      listInterfaces?: InterfaceLister;
      resolve?: HostResolver;
    },
  ) {
    this.listInterfaces = deps.listInterfaces ?? networkInterfaces;
    this.resolve = deps.resolve ?? ((host) => lookup(host));
  }

  async isLocalNetworkReachable(host: string): Promise<boolean> {
    if (!hasExternalIpv4(this.listInterfaces())) {
      return false;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.deps.timeoutMs);
    });
    try {
      return await Promise.race([
        this.resolve(host).then(
          () => true,
          () => false,
        ),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
