import { SliceClient, SliceClientOptions } from '../src/client';
import { DEFAULT_SETTINGS, Settings } from '../src/config/settings';
import {
  InvalidSpecError,
  InvalidStateError,
  InvalidTopologyError,
  NodeNotReadyError,
  SettingsError,
  TransportError,
} from '../src/domain/errors';
import { SliceState } from '../src/domain/reservation';
import { createVirtualClock } from '../src/engine/clock';
import { WaitStatus } from '../src/engine/poller';
import { OrchestratorAdapter, SubmitResult } from '../src/orchestrator/adapter';
import { SimulatedOrchestrator } from '../src/orchestrator/simulated';
import { RemoteChannel } from '../src/remote/channel';
import { MemorySliceStore } from '../src/storage/memory-store';
import { Slice } from '../src/topology/slice';
import { FakeConnector, attachHosts, readTestKey } from './helpers/fake-hosts';
import { TEST_KEYS, pairSlice } from './helpers/slices';

interface Harness {
  client: SliceClient;
  orchestrator: SimulatedOrchestrator;
  store: MemorySliceStore;
}

function harness(provisioningPolls = 3, options: Partial<SliceClientOptions> = {}): Harness {
  const orchestrator = new SimulatedOrchestrator({ provisioningPolls });
  const store = new MemorySliceStore();
  const client = new SliceClient({
    adapter: orchestrator,
    store,
    sliceKeys: TEST_KEYS,
    clock: createVirtualClock(),
    polling: { pollIntervalMs: 1_000 },
    ...options,
  });
  return { client, orchestrator, store };
}

function eventTypes(client: SliceClient): string[] {
  return client.events.history().map((e) => e.type);
}

describe('SliceClient', () => {
  describe('submit', () => {
    test('hands the topology to the orchestrator and merges the first snapshot', async () => {
      const { client, orchestrator } = harness();
      const slice = pairSlice();
      const result = await client.submit(slice);

      expect(result.state).toBe(SliceState.Pending);
      expect(slice.state).toBe(SliceState.Pending);
      expect(slice.sliceId).toEqual(expect.any(String));
      expect(slice.graph.isSubmitted()).toBe(true);
      expect(orchestrator.calls).toEqual(['submit:pair']);
      expect(eventTypes(client)).toEqual(['slice.submitted', 'slice.state_changed']);
      expect(client.events.history()[1].payload).toEqual({ from: SliceState.Submitted, to: SliceState.Pending });
    });

    test('an invalid topology never reaches the orchestrator', async () => {
      const { client, orchestrator } = harness();
      const empty = new Slice({ name: 'empty', projectId: 'test-project', keys: TEST_KEYS });
      const err = await client.submit(empty).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidTopologyError);
      expect(err instanceof InvalidTopologyError && err.message).toMatch(/^Topology of slice "empty" is invalid: /);
      expect(orchestrator.calls).toEqual([]);
      expect(empty.state).toBe(SliceState.Unsubmitted);
    });

    test('a slice is submitted once', async () => {
      const { client } = harness();
      const slice = pairSlice();
      await client.submit(slice);
      await expect(client.submit(slice)).rejects.toThrow('Slice "pair" was already submitted (state Pending)');
    });

    test('passes the requested lease end as an ISO timestamp', async () => {
      const { client } = harness();
      const slice = pairSlice();
      await client.submit(slice, { leaseEnd: new Date('2026-10-25T00:00:00Z') });
      expect(slice.leaseEnd).toBe('2026-10-25T00:00:00.000Z');
      await expect(client.submit(pairSlice('other'), { leaseEnd: 'not-a-date' })).rejects.toThrow(InvalidSpecError);
    });

    test('uses the client key pair when the slice has none', async () => {
      const { client } = harness();
      const slice = new Slice({ name: 'keyless', projectId: 'test-project' });
      slice.graph.addNode('n1', { site: 'STAR', image: 'default_ubuntu_22', instanceType: 'c2.m8.d10' });
      await client.submit(slice);
      expect(slice.keys).toEqual(TEST_KEYS);
    });

    test('a call that outlives its timeout fails as a transport error', async () => {
      const orchestrator = new SimulatedOrchestrator();
      const hanging: OrchestratorAdapter = {
        submit: () => new Promise<SubmitResult>(() => undefined),
        query: (sliceId, options) => orchestrator.query(sliceId, options),
        delete: (sliceId, options) => orchestrator.delete(sliceId, options),
        renew: (sliceId, leaseEnd, options) => orchestrator.renew(sliceId, leaseEnd, options),
        modify: (sliceId, request, options) => orchestrator.modify(sliceId, request, options),
      };
      const client = new SliceClient({ adapter: hanging, sliceKeys: TEST_KEYS, callTimeoutMs: 10 });
      const slice = pairSlice();

      const err = await client.submit(slice).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TransportError);
      expect(err instanceof TransportError && err.message).toBe('Slice submission timed out after 10ms');
      expect(slice.state).toBe(SliceState.Unsubmitted);
      expect(slice.graph.isSubmitted()).toBe(false);
    });
  });

  describe('modify', () => {
    async function stableSlice(h: Harness): Promise<Slice> {
      const slice = pairSlice();
      await h.client.submit(slice);
      await h.client.refresh(slice);
      return slice;
    }

    test('adds a node to a Stable slice and polls it to Stable again', async () => {
      const h = harness(1);
      const slice = await stableSlice(h);
      const sliceId = slice.requireSliceId();
      const managementIp = slice.graph.getNode('n1')?.managementIp;

      const result = await h.client.modify(slice, (graph) => {
        graph.addNode('n3', { site: 'STAR', image: 'default_ubuntu_22', instanceType: 'c2.m8.d10' });
      });
      expect(result.state).toBe(SliceState.Pending);
      expect(result.pendingEntities).toEqual(['n3']);
      expect(slice.state).toBe(SliceState.Pending);
      expect(slice.graph.getNode('n1')?.managementIp).toBe(managementIp);
      expect(slice.graph.isReopened()).toBe(false);
      expect(h.client.events.history(undefined, ['slice.modified'])[0].payload).toEqual({ added: ['n3'], removed: [] });

      const waited = await h.client.wait(slice);
      expect(waited).toMatchObject({ status: WaitStatus.Stable, pollCount: 1 });
      expect(slice.graph.getNode('n3')?.managementIp).toBe('10.20.1.12');
      expect(h.orchestrator.calls).toEqual([
        'submit:pair',
        `query:${sliceId}`,
        `modify:${sliceId}`,
        `query:${sliceId}`,
      ]);
    });

    test('removing a service from a Stable slice releases it at the orchestrator', async () => {
      const h = harness(1);
      const slice = await stableSlice(h);
      const result = await h.client.modify(slice, (graph) => graph.removeNetworkService('ptp'));

      expect(result.state).toBe(SliceState.Stable);
      expect(slice.graph.getNetworkService('ptp')).toBeUndefined();
      expect(slice.lastSnapshot?.networkServices).toEqual({});
      expect(eventTypes(h.client).slice(-1)).toEqual(['slice.modified']);
      expect(h.client.events.history(undefined, ['slice.modified'])[0].payload).toEqual({ added: [], removed: ['ptp'] });
    });

    test('dropping the failed node brings a Failed slice back to Stable', async () => {
      const h = harness(1);
      const slice = pairSlice();
      await h.client.submit(slice);
      h.orchestrator.failEntity(slice.requireSliceId(), 'n2', 'Insufficient resources');
      await h.client.refresh(slice);
      expect(slice.state).toBe(SliceState.Failed);

      const result = await h.client.modify(slice, (graph) => {
        graph.removeNetworkService('ptp');
        graph.removeNode('n2');
      });
      expect(result.state).toBe(SliceState.Stable);
      expect(slice.state).toBe(SliceState.Stable);
      expect(slice.graph.listNodes().map((n) => n.name)).toEqual(['n1']);
    });

    test('a slice still provisioning cannot be modified', async () => {
      const h = harness(3);
      const slice = pairSlice();
      await h.client.submit(slice);
      await expect(h.client.modify(slice, () => undefined)).rejects.toThrow(
        'Slice "pair" can only be modified once it is Stable or Failed (state Pending)',
      );
      expect(h.orchestrator.calls).toEqual(['submit:pair']);
    });

    test('changes that throw leave the graph as it was', async () => {
      const h = harness(1);
      const slice = await stableSlice(h);
      const err = await h.client
        .modify(slice, (graph) => {
          graph.removeNetworkService('ptp');
          graph.addNode('n1', { site: 'STAR', image: 'default_ubuntu_22', instanceType: 'c2.m8.d10' });
        })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(Error);
      expect(slice.graph.getNetworkService('ptp')?.interfaces).toEqual(['n1-nic1-p1', 'n2-nic1-p1']);
      expect(slice.graph.isReopened()).toBe(false);
      expect(h.orchestrator.calls.filter((c) => c.startsWith('modify:'))).toEqual([]);
    });

    test('a failed call undoes the changes', async () => {
      const h = harness(1);
      const slice = await stableSlice(h);
      h.orchestrator.failNextCalls(1);

      await expect(
        h.client.modify(slice, (graph) => {
          graph.addNode('n3', { site: 'STAR', image: 'default_ubuntu_22', instanceType: 'c2.m8.d10' });
        }),
      ).rejects.toThrow(TransportError);
      expect(slice.graph.getNode('n3')).toBeUndefined();
      expect(slice.state).toBe(SliceState.Stable);
      expect(() => slice.graph.addNode('n4', { site: 'STAR', image: 'default_ubuntu_22', instanceType: 'c2.m8.d10' })).toThrow(
        'The topology cannot be extended after submission',
      );
    });
  });

  describe('wait and refresh', () => {
    test('wait polls to Stable and announces the result', async () => {
      const { client, orchestrator } = harness(3);
      const slice = pairSlice();
      await client.submit(slice);
      const result = await client.wait(slice);

      expect(result).toMatchObject({ status: WaitStatus.Stable, pollCount: 3, elapsedMs: 2_000 });
      expect(orchestrator.calls.filter((c) => c.startsWith('query:'))).toHaveLength(3);
      expect(eventTypes(client)).toEqual([
        'slice.submitted',
        'slice.state_changed',
        'slice.state_changed',
        'slice.wait_finished',
      ]);
      expect(client.events.history()[3].payload).toMatchObject({ status: WaitStatus.Stable, pollCount: 3 });
    });

    test('refresh merges one snapshot', async () => {
      const { client, orchestrator } = harness(1);
      const slice = pairSlice();
      await client.submit(slice);
      const result = await client.refresh(slice);

      expect(result.state).toBe(SliceState.Stable);
      expect(slice.graph.getNode('n1')?.managementIp).toEqual(expect.any(String));
      expect(orchestrator.calls).toHaveLength(2);
    });

    test('refresh needs a submitted slice', async () => {
      const { client } = harness();
      await expect(client.refresh(pairSlice())).rejects.toThrow(InvalidStateError);
    });
  });

  describe('delete and renew', () => {
    test('deleting a submitted slice goes through the orchestrator', async () => {
      const { client, orchestrator, store } = harness();
      const slice = pairSlice();
      await client.submit(slice);
      await client.save(slice);
      const sliceId = slice.sliceId;

      await client.delete(slice);
      expect(orchestrator.calls).toEqual(['submit:pair', `delete:${sliceId}`]);
      expect(slice.state).toBe(SliceState.Deleted);
      expect(await store.list()).toEqual([]);
      expect(eventTypes(client).slice(-2)).toEqual(['slice.state_changed', 'slice.deleted']);

      await client.delete(slice);
      expect(orchestrator.calls).toHaveLength(2);
    });

    test('deleting an unsubmitted slice stays local', async () => {
      const { client, orchestrator } = harness();
      const slice = pairSlice();
      await client.delete(slice);

      expect(orchestrator.calls).toEqual([]);
      expect(slice.state).toBe(SliceState.Deleted);
      expect(() => slice.graph.addComponent('n1', 'NIC_Basic')).toThrow(
        'The slice has been deleted; its topology can no longer change',
      );
    });

    test('renew records the new lease end', async () => {
      const { client } = harness();
      const slice = pairSlice();
      await client.submit(slice);
      const leaseEnd = new Date(Date.now() + 3 * 24 * 3_600_000);
      await client.renew(slice, leaseEnd);

      expect(slice.leaseEnd).toBe(leaseEnd.toISOString());
      expect(client.events.history(undefined, ['slice.renewed'])[0].payload).toEqual({
        leaseEnd: leaseEnd.toISOString(),
      });
    });

    test('renew refuses an unreadable date and a deleted slice', async () => {
      const { client } = harness();
      const slice = pairSlice();
      await client.submit(slice);
      await expect(client.renew(slice, 'soon')).rejects.toThrow('Invalid lease end: soon');
      await client.delete(slice);
      await expect(client.renew(slice, new Date())).rejects.toThrow('Slice "pair" has been deleted');
    });
  });

  describe('save and load', () => {
    test('a saved slice resumes without contacting the orchestrator', async () => {
      const { client, orchestrator } = harness(1);
      const slice = pairSlice();
      await client.submit(slice);
      await client.refresh(slice);
      await client.save(slice);

      const restored = await client.load('pair');
      expect(restored?.state).toBe(SliceState.Stable);
      expect(restored?.sliceId).toBe(slice.sliceId);
      expect(restored?.graph.getInterface('n1-nic1-p1')?.mac).toBe(slice.graph.getInterface('n1-nic1-p1')?.mac);
      expect(orchestrator.calls).toHaveLength(2);
      expect(await client.listSaved()).toEqual(['pair']);
    });

    test('load returns null for an unknown slice', async () => {
      const { client } = harness();
      expect(await client.load('nope')).toBeNull();
    });

    test('saving needs a store', async () => {
      const client = new SliceClient({ adapter: new SimulatedOrchestrator() });
      await expect(client.save(pairSlice())).rejects.toThrow('No slice state store is configured');
    });
  });

  describe('remote work', () => {
    function channelFor(connector: FakeConnector): RemoteChannel {
      return new RemoteChannel({
        bastion: { host: 'bastion.test', username: 'tester', keyFile: '/keys/bastion' },
        sliceKey: { privateKeyFile: '/keys/slice' },
        connector,
        clock: createVirtualClock(),
        readKey: readTestKey,
      });
    }

    test('configure reports each node as an event', async () => {
      const connector = new FakeConnector();
      const { client } = harness(1, { channel: channelFor(connector) });
      const slice = pairSlice();
      await client.submit(slice);
      await client.refresh(slice);
      attachHosts(connector, slice);

      const result = await client.configure(slice);
      expect(result).toEqual({ configured: ['n1', 'n2'], failures: {} });
      const configured = client.events.history(undefined, ['node.configured']);
      expect(configured.map((e) => e.node)).toEqual(['n1', 'n2']);
    });

    test('configure needs a remote channel', async () => {
      const { client } = harness();
      await expect(client.configure(pairSlice())).rejects.toThrow('Configuring nodes needs a remote channel');
    });

    test('executeOn refuses a node without a management address', async () => {
      const connector = new FakeConnector();
      const { client } = harness(3, { channel: channelFor(connector) });
      await expect(client.executeOn(pairSlice(), 'n1', 'uname -a')).rejects.toThrow(NodeNotReadyError);
      expect(connector.connectAttempts).toBe(0);
    });
  });

  describe('settings', () => {
    const settings: Settings = {
      ...DEFAULT_SETTINGS,
      projectId: 'test-project',
      bastionUsername: 'tester',
      bastionKeyFile: '/keys/bastion',
      slicePrivateKeyFile: '/keys/slice',
      slicePublicKeyFile: '/keys/slice.pub',
    };

    test('fromSettings builds a client whose slices use the configured project', () => {
      const client = SliceClient.fromSettings(settings, {
        adapter: new SimulatedOrchestrator(),
        store: new MemorySliceStore(),
      });
      expect(client.createSlice('demo').projectId).toBe('test-project');
    });

    test('fromSettings refuses incomplete settings', () => {
      expect(() =>
        SliceClient.fromSettings({ ...settings, bastionUsername: undefined }, { adapter: new SimulatedOrchestrator() }),
      ).toThrow(SettingsError);
    });

    test('createSlice needs a project id', () => {
      const { client } = harness();
      expect(() => client.createSlice('demo')).toThrow('Slice "demo" needs a project id; none is configured');
    });
  });
});
