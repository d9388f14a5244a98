import { connect as connectTcp } from 'net';
import { abortReason } from '../errors';
import { ConnectionTarget, RemoteSession, SessionTransport } from './types';

/**
 * Transport that only proves the port accepts TCP connections. Used when no real transport is
 * plugged in, so a build still waits for the machine to come up before provisioning.
 */
export class TcpProbeTransport implements SessionTransport {
  constructor(private readonly attemptTimeoutMs = 5000) {}

  connect(target: ConnectionTarget, signal: AbortSignal): Promise<RemoteSession> {
    return new Promise<RemoteSession>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const socket = connectTcp({ host: target.host, port: target.port });
      const onAbort = () => {
        socket.destroy();
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      socket.setTimeout(this.attemptTimeoutMs);

      socket.once('connect', () => {
        signal.removeEventListener('abort', onAbort);
        socket.end();
        resolve({ target, close: async () => undefined });
      });
      socket.once('timeout', () => {
        signal.removeEventListener('abort', onAbort);
        socket.destroy();
        reject(new Error(`connect to ${target.host}:${target.port} timed out`));
      });
      socket.once('error', error => {
        signal.removeEventListener('abort', onAbort);
        socket.destroy();
        reject(error);
      });
    });
  }
}
