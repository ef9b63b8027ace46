/**
 * Connectivity probe
 *
 * Decides whether remote git operations are worth attempting by opening a
 * plain TCP connection to the remote's host. All failures collapse to false.
 */

import net from "node:net";
import path from "node:path";

export type ProbeTarget = {
  host: string;
  port: number;
};

export type Prober = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

const DEFAULT_PORTS: Record<string, number> = {
  "https:": 443,
  "http:": 80,
  "ssh:": 22,
  "git+ssh:": 22,
  "ssh+git:": 22,
  "git:": 9418,
};

const SCHEME_RE = /^[a-z][a-z0-9+.-]*:\/\//i;
// user@host:path, the scp-like syntax git accepts for ssh remotes
const SCP_LIKE_RE = /^(?:[^@/\s]+@)?([^:/\s]+):(?!\/)/;

/**
 * Attempt a TCP connection to host:port, resolving true only if it
 * connects within timeoutMs.
 */
export const probe: Prober = (host, port, timeoutMs) =>
  new Promise<boolean>((resolve) => {
    let settled = false;
    let socket: net.Socket | undefined;

    const finish = (reachable: boolean) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket?.destroy();
      resolve(reachable);
    };

    const timer = setTimeout(() => finish(false), timeoutMs);

    try {
      socket = net.connect({ host, port });
      socket.once("connect", () => finish(true));
      socket.once("error", () => finish(false));
    } catch {
      // Invalid port or host arguments
      finish(false);
    }
  });

/**
 * Work out which host/port stands for a remote URL.
 *
 * Returns null for local remotes (paths and file:// URLs), which need no
 * network. Remotes that cannot be parsed fall back to the configured
 * network host/port.
 */
export function resolveProbeTarget(remote: string, fallback: ProbeTarget): ProbeTarget | null {
  if (remote.startsWith("file://") || path.isAbsolute(remote) || remote.startsWith(".")) {
    return null;
  }

  if (SCHEME_RE.test(remote)) {
    let url: URL;
    try {
      url = new URL(remote);
    } catch {
      return fallback;
    }
    const defaultPort = DEFAULT_PORTS[url.protocol];
    if (!url.hostname || defaultPort === undefined) {
      return fallback;
    }
    return {
      host: url.hostname.replace(/^\[(.*)\]$/, "$1"),
      port: url.port ? Number(url.port) : defaultPort,
    };
  }

  const scp = SCP_LIKE_RE.exec(remote);
  if (scp) {
    return { host: scp[1], port: 22 };
  }

  return fallback;
}
