// Remote session transport contract. The build only supplies the target; it never drives the session.

export type ConnectionAuth =
  | { kind: 'ssh-key'; privateKey: string }
  | { kind: 'password'; password: string }
  | { kind: 'none' };

export interface ConnectionTarget {
  protocol: 'ssh' | 'winrm' | 'none';
  host: string;
  port: number;
  username: string;
  auth: ConnectionAuth;
  useTls?: boolean;
}

export interface RemoteSession {
  readonly target: ConnectionTarget;
  close(): Promise<void>;
}

export interface SessionTransport {
  connect(target: ConnectionTarget, signal: AbortSignal): Promise<RemoteSession>;
}

/**
 * External provisioning phase run against the connected machine.
 */
export interface Provisioner {
  provision(session: RemoteSession, signal: AbortSignal): Promise<void>;
}
