import { describe, it, expect } from 'vitest';
import { ConnectivityTimeoutError, MissingStateError } from '../../errors';
import { REDACTED } from '../../logging/logger';
import { BuildState } from '../../orchestration/state';
import { ServerRecord } from '../../provisioning/types';
import { RemoteSession } from '../../transport/types';
import { createHarness, FakeTransport, startServer } from '../../__tests__/fakes';
import { ProvisionStep } from '../provision';
import { buildConnectionTarget, serverAddress, WaitForConnectivityStep } from '../wait-for-connectivity';

const server: ServerRecord = {
  id: 1,
  name: 'srv',
  status: 'running',
  serverType: 'cx11',
  publicIPv4: '203.0.113.10',
  publicIPv6: '2001:db8::1',
  privateIPs: ['10.0.0.2']
};

describe('serverAddress', () => {
  it('should prefer IPv4, then IPv6, then the first private address', () => {
    expect(serverAddress(server)).toBe('203.0.113.10');
    expect(serverAddress({ ...server, publicIPv4: undefined })).toBe('2001:db8::1');
    expect(serverAddress({ ...server, publicIPv4: undefined, publicIPv6: undefined })).toBe('10.0.0.2');
    expect(serverAddress({ ...server, publicIPv4: undefined, publicIPv6: undefined, privateIPs: [] })).toBeUndefined();
  });
});

describe('buildConnectionTarget', () => {
  it('should authenticate ssh with the build key', () => {
    const state = new BuildState();
    state.set('sshKey', { privateKey: 'test-private-key', generated: true, keyId: 1 });
    state.set('rootPassword', 'test-root-password');

    expect(buildConnectionTarget({ type: 'ssh' }, '203.0.113.10', state)).toEqual({
      protocol: 'ssh',
      host: '203.0.113.10',
      port: 22,
      username: 'root',
      auth: { kind: 'ssh-key', privateKey: 'test-private-key' }
    });
  });

  it('should fall back to the root password without a key', () => {
    const state = new BuildState();
    state.set('sshKey', { generated: false });
    state.set('rootPassword', 'test-root-password');

    const target = buildConnectionTarget({ type: 'ssh', username: 'admin', port: 2222 }, '203.0.113.10', state);

    expect(target.auth).toEqual({ kind: 'password', password: 'test-root-password' });
    expect(target.username).toBe('admin');
    expect(target.port).toBe(2222);
  });

  it('should default winrm ports by transport security', () => {
    const state = new BuildState();

    expect(buildConnectionTarget({ type: 'winrm', password: 'test-password' }, 'h', state)).toMatchObject({
      protocol: 'winrm',
      port: 5985,
      username: 'Administrator',
      useTls: false
    });
    expect(buildConnectionTarget({ type: 'winrm', password: 'test-password', winrm_use_ssl: true }, 'h', state).port).toBe(5986);
  });
});

describe('WaitForConnectivityStep', () => {
  const communicator = { type: 'ssh' as const, timeout: 3000, retry_interval: 1000 };

  it('should retry until the transport connects', async () => {
    const h = createHarness({ communicator });
    await startServer(h);
    h.state.set('sshKey', { privateKey: 'test-private-key', generated: true, keyId: 2001 });
    const transport = new FakeTransport();
    transport.failuresBeforeConnect = 2;

    await new WaitForConnectivityStep(h.deps, transport).run(h.state, h.context);

    expect(transport.attempts).toHaveLength(3);
    expect(h.clock.sleeps).toEqual([1000, 1000]);
    expect(h.state.get('connection')).toMatchObject({ host: '203.0.113.10', port: 22 });
    expect(h.state.get('session').target.host).toBe('203.0.113.10');
  });

  it('should report the last connection error when the window closes', async () => {
    const h = createHarness({ communicator });
    await startServer(h);
    h.state.set('sshKey', { generated: false });
    const transport = new FakeTransport();
    transport.refuseAlways = true;

    const run = new WaitForConnectivityStep(h.deps, transport).run(h.state, h.context);

    await expect(run).rejects.toThrow(ConnectivityTimeoutError);
    await expect(run).rejects.toThrow(
      '203.0.113.10:22 not reachable within 3000ms: connect ECONNREFUSED 203.0.113.10:22'
    );
    expect(transport.attempts).toHaveLength(4);
  });

  it('should only publish the target when there is no communicator', async () => {
    const h = createHarness({ communicator: { type: 'none' } });
    await startServer(h);
    const transport = new FakeTransport();

    await new WaitForConnectivityStep(h.deps, transport).run(h.state, h.context);

    expect(transport.attempts).toEqual([]);
    expect(h.state.get('connection').host).toBe('203.0.113.10');
    expect(h.state.has('session')).toBe(false);
  });

  it('should redact a password used for the connection', async () => {
    const h = createHarness({ communicator });
    await startServer(h);
    h.state.set('sshKey', { generated: false });
    h.state.set('rootPassword', 'test-root-password');

    await new WaitForConnectivityStep(h.deps, new FakeTransport()).run(h.state, h.context);

    expect(h.logger.redact('test-root-password')).toBe(REDACTED);
  });

  it('should fail when the server has no address', async () => {
    const h = createHarness({ communicator });
    h.state.set('server', { ...server, publicIPv4: undefined, publicIPv6: undefined, privateIPs: [] });

    await expect(new WaitForConnectivityStep(h.deps, new FakeTransport()).run(h.state, h.context)).rejects.toThrow(
      MissingStateError
    );
  });

  it('should close the session once on cleanup', async () => {
    const h = createHarness({ communicator });
    await startServer(h);
    h.state.set('sshKey', { generated: false });
    const transport = new FakeTransport();
    const step = new WaitForConnectivityStep(h.deps, transport);

    await step.run(h.state, h.context);
    await step.cleanup(h.state);
    await step.cleanup(h.state);

    expect(transport.closed).toBe(1);
    expect(h.state.has('session')).toBe(false);
  });
});

describe('ProvisionStep', () => {
  it('should hand the session to the provisioner', async () => {
    const h = createHarness();
    const sessions: RemoteSession[] = [];
    const session: RemoteSession = {
      target: { protocol: 'ssh', host: '203.0.113.10', port: 22, username: 'root', auth: { kind: 'none' } },
      close: async () => undefined
    };
    h.state.set('connection', session.target);
    h.state.set('session', session);

    await new ProvisionStep({ provision: async received => { sessions.push(received); } }).run(h.state, h.context);

    expect(sessions).toEqual([session]);
  });

  it('should require a connected session', async () => {
    const h = createHarness();

    await expect(
      new ProvisionStep({ provision: async () => undefined }).run(h.state, h.context)
    ).rejects.toThrow('Build state "session" is not available yet');
  });
});
