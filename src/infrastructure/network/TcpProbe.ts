import net from 'net';

export interface ProbeResult {
  reachable: boolean;
  responseTimeMs: number;
  error: string | null;
}

export type ConnectivityProbe = (host: string, port: number, timeoutMs: number) => Promise<ProbeResult>;

/**
 * Opens and immediately closes a TCP connection to host:port
 */
export const tcpProbe: ConnectivityProbe = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const start = process.hrtime.bigint();
    const elapsed = () => Math.round(Number(process.hrtime.bigint() - start) / 10_000) / 100;
    const socket = new net.Socket();
    let settled = false;

    const finish = (result: ProbeResult) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish({ reachable: true, responseTimeMs: elapsed(), error: null }));
    socket.once('timeout', () =>
      finish({ reachable: false, responseTimeMs: elapsed(), error: 'Connection timeout' })
    );
    socket.once('error', (error: NodeJS.ErrnoException) =>
      finish({
        reachable: false,
        responseTimeMs: elapsed(),
        error: error.code === 'ECONNREFUSED' ? 'Connection refused' : error.message,
      })
    );

    socket.connect(port, host);
  });
