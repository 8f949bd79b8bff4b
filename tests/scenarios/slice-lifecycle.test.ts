/**
 * End-to-end runs of the client against the simulated orchestrator and
 * in-process SSH hosts.
 */

import { SliceClient } from '../../src/client';
import { InvalidTopologyError, NodeNotReadyError } from '../../src/domain/errors';
import { SliceState } from '../../src/domain/reservation';
import { NetworkServiceType } from '../../src/domain/topology';
import { createVirtualClock } from '../../src/engine/clock';
import { WaitStatus } from '../../src/engine/poller';
import { SimulatedOrchestrator } from '../../src/orchestrator/simulated';
import { RemoteChannel } from '../../src/remote/channel';
import { MemorySliceStore } from '../../src/storage/memory-store';
import { FakeConnector, attachHosts, readTestKey } from '../helpers/fake-hosts';
import { TEST_KEYS, pairSlice } from '../helpers/slices';

function rig(provisioningPolls = 3) {
  const orchestrator = new SimulatedOrchestrator({ provisioningPolls });
  const connector = new FakeConnector();
  const store = new MemorySliceStore();
  const clock = createVirtualClock();
  const channel = new RemoteChannel({
    bastion: { host: 'bastion.test', username: 'tester', keyFile: '/keys/bastion' },
    sliceKey: { privateKeyFile: TEST_KEYS.privateKeyFile },
    connector,
    clock,
    readKey: readTestKey,
  });
  const client = new SliceClient({ adapter: orchestrator, channel, store, sliceKeys: TEST_KEYS, clock });
  return { orchestrator, connector, store, clock, client };
}

describe('slice lifecycle', () => {
  test('a point-to-point pair becomes stable after three polls', async () => {
    const { client, orchestrator, clock } = rig(3);
    const slice = pairSlice();
    await client.submit(slice);
    const result = await client.wait(slice, { pollIntervalMs: 10_000 });

    expect(result.status).toBe(WaitStatus.Stable);
    expect(result.pollCount).toBe(3);
    expect(orchestrator.calls.filter((c) => c.startsWith('query:'))).toHaveLength(3);
    expect(clock.sleeps).toEqual([10_000, 10_000]);
    expect(slice.state).toBe(SliceState.Stable);
    for (const name of ['n1-nic1-p1', 'n2-nic1-p1']) {
      expect(slice.graph.getInterface(name)?.mac).toMatch(/^02:5C:/);
    }
  });

  test('a point-to-point service with one end is refused before anything is sent', () => {
    const { orchestrator } = rig();
    const slice = pairSlice('lonely');
    slice.graph.removeNetworkService('ptp');

    expect(() =>
      slice.graph.addNetworkService('ptp', NetworkServiceType.L2PTP, ['n1-nic1-p1']),
    ).toThrow(InvalidTopologyError);
    expect(() =>
      slice.graph.addNetworkService('ptp', NetworkServiceType.L2PTP, ['n1-nic1-p1']),
    ).toThrow('Network service "ptp": L2PTP requires exactly 2 interfaces, got 1');
    expect(slice.graph.getNetworkService('ptp')).toBeUndefined();
    expect(orchestrator.calls).toEqual([]);
  });

  test('running a command on a node without a management address never connects', async () => {
    const { client, connector } = rig();
    const slice = pairSlice();
    await client.submit(slice);

    await expect(client.executeOn(slice, 'n1', 'hostname')).rejects.toThrow(NodeNotReadyError);
    expect(connector.connectAttempts).toBe(0);
  });

  test('submit, wait, configure, resume elsewhere and delete', async () => {
    const first = rig(2);
    const slice = pairSlice();
    await first.client.submit(slice);
    await first.client.wait(slice, { pollIntervalMs: 1_000 });
    const hosts = attachHosts(first.connector, slice);

    const configured = await first.client.configure(slice);
    expect(configured.configured).toEqual(['n1', 'n2']);
    expect(slice.graph.getInterface('n1-nic1-p1')?.configuredAddresses).toEqual(['192.168.10.1/24']);
    await first.client.save(slice);

    const second = new SliceClient({
      adapter: first.orchestrator,
      channel: new RemoteChannel({
        bastion: { host: 'bastion.test', username: 'tester', keyFile: '/keys/bastion' },
        sliceKey: { privateKeyFile: TEST_KEYS.privateKeyFile },
        connector: first.connector,
        clock: first.clock,
        readKey: readTestKey,
      }),
      store: first.store,
    });
    const resumed = await second.load('pair');
    if (!resumed) throw new Error('slice was not saved');
    expect(resumed.state).toBe(SliceState.Stable);

    const again = await second.configure(resumed);
    expect(again.failures).toEqual({});
    expect(hosts.get('n1')?.mutations()).toEqual([
      'sudo ip addr add 192.168.10.1/24 dev ens7',
      'sudo ip link set dev ens7 up',
    ]);

    await second.delete(resumed);
    expect(first.orchestrator.calls.at(-1)).toBe(`delete:${resumed.sliceId}`);
    expect(await second.listSaved()).toEqual([]);
  });
});
