import { ConnectError, NodeNotReadyError } from '../../src/domain/errors';
import { ReservationState } from '../../src/domain/reservation';
import { createVirtualClock } from '../../src/engine/clock';
import { RemoteChannel, RemoteTarget, targetOf } from '../../src/remote/channel';
import { SshConnector, SshSession } from '../../src/remote/connector';
import { FakeConnector, readTestKey } from '../helpers/fake-hosts';
import { pairSlice } from '../helpers/slices';

const target = (name: string, managementIp?: string): RemoteTarget => ({
  name,
  managementIp,
  username: 'ubuntu',
  reservationState: managementIp ? ReservationState.Active : ReservationState.Ticketed,
});

function channelWith(connector: SshConnector, clock = createVirtualClock()): RemoteChannel {
  return new RemoteChannel({
    bastion: { host: 'bastion.test', username: 'tester', keyFile: '/keys/bastion', passphrase: 'test-secret-passphrase' },
    sliceKey: { privateKeyFile: '/keys/slice' },
    connector,
    clock,
    readKey: readTestKey,
  });
}

describe('RemoteChannel', () => {
  test('refuses a node without a management address before connecting', async () => {
    const connector = new FakeConnector();
    const err = await channelWith(connector)
      .execute(target('n1'), 'uname -a')
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NodeNotReadyError);
    expect(err instanceof NodeNotReadyError && err.message).toBe(
      'Node "n1" has no management address (reservation state: Ticketed)',
    );
    expect(connector.connectAttempts).toBe(0);
  });

  test('connects through the bastion with both keys', async () => {
    const connector = new FakeConnector();
    connector.addHost('10.20.1.10').script('uname -a', { exitCode: 0, stdout: 'Linux n1\n', stderr: '', timedOut: false });
    const result = await channelWith(connector).execute(target('n1', '10.20.1.10'), 'uname -a');

    expect(result.stdout).toBe('Linux n1\n');
    expect(connector.routes[0]).toEqual({
      bastion: {
        host: 'bastion.test',
        port: 22,
        username: 'tester',
        privateKey: 'test-key-for-/keys/bastion',
        passphrase: 'test-secret-passphrase',
      },
      node: { host: '10.20.1.10', port: 22, username: 'ubuntu', privateKey: 'test-key-for-/keys/slice', passphrase: undefined },
      readyTimeoutMs: undefined,
    });
    expect(connector.openSessions).toBe(0);
    expect(connector.closedSessions).toBe(1);
  });

  test('returns a non-zero exit status as data', async () => {
    const connector = new FakeConnector();
    connector.addHost('10.20.1.10').script('false', { exitCode: 1, stdout: '', stderr: '', timedOut: false });
    const result = await channelWith(connector).execute(target('n1', '10.20.1.10'), 'false');
    expect(result.exitCode).toBe(1);
  });

  test('retries failed connections with backoff', async () => {
    const connector = new FakeConnector();
    connector.addHost('10.20.1.10');
    connector.connectFailures.set('10.20.1.10', 2);
    const clock = createVirtualClock();
    const result = await channelWith(connector, clock).execute(target('n1', '10.20.1.10'), 'true');

    expect(result.exitCode).toBe(0);
    expect(connector.connectAttempts).toBe(3);
    expect(clock.sleeps).toEqual([2_000, 4_000]);
  });

  test('gives up after the configured attempts', async () => {
    const connector = new FakeConnector();
    connector.connectFailures.set('10.20.1.10', 5);
    const err = await channelWith(connector)
      .execute(target('n1', '10.20.1.10'), 'true')
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConnectError);
    expect(err instanceof ConnectError && err.message).toBe(
      'Could not reach node "n1" after 3 attempts: connect ECONNREFUSED 10.20.1.10:22',
    );
    expect(connector.openSessions).toBe(0);
  });

  test('masks key passphrases in connection errors', async () => {
    const leaky: SshConnector = {
      connect: async () => {
        throw new Error('bad passphrase test-secret-passphrase for key');
      },
    };
    const channel = new RemoteChannel({
      bastion: { host: 'bastion.test', username: 'tester', keyFile: '/keys/bastion', passphrase: 'test-secret-passphrase' },
      sliceKey: { privateKeyFile: '/keys/slice' },
      connector: leaky,
      connectAttempts: 1,
      readKey: readTestKey,
    });
    await expect(channel.execute(target('n1', '10.20.1.10'), 'true')).rejects.toThrow(
      'Could not reach node "n1" after 1 attempts: bad passphrase ******************rase for key',
    );
  });

  test('closes the session when the command itself fails', async () => {
    let closed = 0;
    const broken: SshConnector = {
      connect: async (): Promise<SshSession> => ({
        exec: async () => {
          throw new Error('channel closed by peer');
        },
        upload: async () => undefined,
        download: async () => undefined,
        close: () => {
          closed++;
        },
      }),
    };
    await expect(channelWith(broken).execute(target('n1', '10.20.1.10'), 'true')).rejects.toThrow(
      'channel closed by peer',
    );
    expect(closed).toBe(1);
  });

  test('uploads through a session of its own', async () => {
    const connector = new FakeConnector();
    const host = connector.addHost('10.20.1.10');
    await channelWith(connector).upload(target('n1', '10.20.1.10'), './run.sh', 'run.sh');
    expect(host.uploads).toEqual([{ localPath: './run.sh', remotePath: 'run.sh' }]);
    expect(connector.closedSessions).toBe(1);
  });

  test('testSsh makes a single attempt', async () => {
    const connector = new FakeConnector();
    connector.connectFailures.set('10.20.1.10', 1);
    const channel = channelWith(connector);
    expect(await channel.testSsh(target('n1'))).toBe(false);
    expect(await channel.testSsh(target('n1', '10.20.1.10'))).toBe(false);
    expect(connector.connectAttempts).toBe(1);
  });

  test('waitForSsh polls until the node answers', async () => {
    const connector = new FakeConnector();
    connector.addHost('10.20.1.10');
    connector.connectFailures.set('10.20.1.10', 2);
    const clock = createVirtualClock();
    const result = await channelWith(connector, clock).waitForSsh([target('n1', '10.20.1.10')], {
      intervalMs: 5_000,
    });
    expect(result).toEqual({ ready: ['n1'], unreachable: [] });
    expect(clock.sleeps).toEqual([5_000, 5_000]);
  });

  test('waitForSsh reports nodes that never answer', async () => {
    const connector = new FakeConnector();
    const clock = createVirtualClock();
    const result = await channelWith(connector, clock).waitForSsh([target('n1', '10.20.1.10')], {
      timeoutMs: 25_000,
      intervalMs: 10_000,
    });
    expect(result).toEqual({ ready: [], unreachable: ['n1'] });
    expect(connector.connectAttempts).toBe(3);
  });

  test('targetOf reads the node from the graph', () => {
    const slice = pairSlice();
    expect(targetOf(slice.graph, 'n2')).toEqual({
      name: 'n2',
      managementIp: undefined,
      username: 'rocky',
      reservationState: ReservationState.Unsubmitted,
    });
  });
});
