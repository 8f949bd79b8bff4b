/**
 * Post-Boot Configurator.
 *
 * Brings a provisioned node's network to the state the graph describes:
 * management interface up, dataplane interfaces matched by MAC, VLAN
 * sub-interfaces, addresses, links up, routes, then the user's post-boot
 * tasks once. Every mutating command is preceded by a read of the current
 * state, so running the sequence again changes nothing.
 *
 * Nodes are configured concurrently and independently: a failing node is
 * reported in the batch result and never stops the others.
 */

import { ConfigurationError, SliceError } from '../domain/errors';
import { SliceState } from '../domain/reservation';
import { InterfaceRecord, NodeRecord } from '../domain/topology';
import { Reconciler } from '../engine/reconciler';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { CommandOptions, RemoteTarget, targetOf } from '../remote/channel';
import { ExecResult } from '../remote/connector';
import { runBounded } from '../remote/worker-pool';
import { canonicalSubnet } from '../topology/addressing';
import { TopologyGraph } from '../topology/graph';
import { Slice } from '../topology/slice';
import { AddressPlan, planAddresses } from './address-plan';
import {
  IP_COMMANDS,
  LinkInfo,
  RouteInfo,
  configuredAddresses,
  findLinkByMac,
  hasAddress,
  managementDevice,
  parseAddrList,
  parseRouteList,
  sameAddress,
} from './ip-commands';

/** The part of the remote channel the configurator uses. */
export interface CommandRunner {
  execute(target: RemoteTarget, command: string, options?: CommandOptions): Promise<ExecResult>;
  upload(target: RemoteTarget, localPath: string, remotePath: string, signal?: AbortSignal): Promise<void>;
}

export interface ConfigureOptions {
  /** Nodes to configure. Default: every node of the slice. */
  nodes?: readonly string[];
  /** Nodes configured at once. Default: 32. */
  concurrency?: number;
  /** Remove addresses the plan does not call for from dataplane devices. */
  flushUnexpected?: boolean;
  commandTimeoutMs?: number;
  signal?: AbortSignal;
  /** Remote file marking post-boot tasks as done. */
  markerPath?: string;
}

export interface ConfigureResult {
  configured: string[];
  failures: Record<string, Error>;
}

export const DEFAULT_CONFIGURE_CONCURRENCY = 32;
export const DEFAULT_POST_BOOT_MARKER = '.slicekit-post-boot-done';

export interface PostBootConfiguratorDeps {
  channel: CommandRunner;
  reconciler?: Reconciler;
  logger?: Logger;
}

export class PostBootConfigurator {
  private readonly channel: CommandRunner;
  private readonly reconciler: Reconciler;
  private readonly log: Logger;

  constructor(deps: PostBootConfiguratorDeps) {
    this.channel = deps.channel;
    this.reconciler = deps.reconciler ?? new Reconciler(deps.logger);
    this.log = (deps.logger ?? rootLogger).child({ module: 'configure' });
  }

  async configure(slice: Slice, options: ConfigureOptions = {}): Promise<ConfigureResult> {
    if (slice.state !== SliceState.Stable) {
      this.log.warn('Configuring a slice that is not stable', { slice: slice.name, state: slice.state });
    }
    const graph = slice.graph;
    const plan = planAddresses(graph);
    const nodes = options.nodes ?? graph.listNodes().map((n) => n.name);

    const settled = await runBounded(nodes, options.concurrency ?? DEFAULT_CONFIGURE_CONCURRENCY, (nodeName) =>
      this.configureNode(graph, nodeName, plan, options),
    );

    const result: ConfigureResult = { configured: [], failures: {} };
    settled.forEach((outcome, i) => {
      const nodeName = nodes[i];
      if (outcome.status === 'fulfilled') {
        result.configured.push(nodeName);
        return;
      }
      const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      result.failures[nodeName] = error;
      this.log.error('Node configuration failed', { slice: slice.name, node: nodeName, ...errorContext(error) });
    });
    this.log.info('Configuration finished', {
      slice: slice.name,
      configured: result.configured.length,
      failed: Object.keys(result.failures).length,
    });
    return result;
  }

  private async configureNode(
    graph: TopologyGraph,
    nodeName: string,
    plan: AddressPlan,
    options: ConfigureOptions,
  ): Promise<void> {
    const node = graph.requireNode(nodeName);
    const run = new NodeSession(this.channel, targetOf(graph, nodeName), options, this.log.child({ node: nodeName }));

    const links = parseAddrList(await run.read('inspect', IP_COMMANDS.listAddresses));
    const routes = parseRouteList(await run.read('inspect', IP_COMMANDS.listRoutes(4)));

    const management = managementDevice(routes);
    const managementLink = management ? links.find((l) => l.name === management) : undefined;
    if (managementLink && !managementLink.up) {
      await run.mutate('management-up', IP_COMMANDS.linkUp(managementLink.name));
    }

    const configured = new Map<string, string[]>();
    const attached = graph
      .listInterfaces(nodeName)
      .filter((iface) => iface.networkService !== undefined)
      .sort((a, b) => a.name.localeCompare(b.name));
    for (const iface of attached) {
      const address = await this.configureInterface(run, iface, links, plan, options);
      if (address) configured.set(iface.name, [address]);
    }

    await this.configureRoutes(run, graph, node, routes);
    await this.runPostBootTasks(run, node, options);

    if (configured.size > 0) {
      this.reconciler.recordConfiguration(graph, nodeName, configured);
    }
  }

  /** Returns the configured `address/prefix`, if the interface gets one. */
  private async configureInterface(
    run: NodeSession,
    iface: InterfaceRecord,
    links: readonly LinkInfo[],
    plan: AddressPlan,
    options: ConfigureOptions,
  ): Promise<string | undefined> {
    if (!iface.mac) {
      throw run.fail('match-interface', `interface "${iface.name}" has no MAC address yet`);
    }
    const link = findLinkByMac(links, iface.mac);
    if (!link) {
      throw run.fail('match-interface', `no device carries MAC ${iface.mac} of "${iface.name}"`);
    }

    const planned = plan.addresses.get(iface.name);
    const problem = iface.networkService ? plan.problems.get(iface.networkService) : undefined;
    if (!planned && problem) {
      throw run.fail('address', `network service "${iface.networkService}": ${problem}`);
    }

    const vlan = iface.vlan ?? iface.assignedVlan;
    const device = vlan !== undefined ? `${link.name}.${vlan}` : link.name;
    let deviceLink = links.find((l) => l.name === device);

    if (options.flushUnexpected && deviceLink) {
      const unexpected = configuredAddresses(deviceLink).filter(
        (a) => !planned || !sameAddress(a, planned.address, planned.prefix),
      );
      if (unexpected.length > 0) {
        await run.mutate('flush', IP_COMMANDS.flushAddresses(device));
        deviceLink = { ...deviceLink, addresses: deviceLink.addresses.filter((a) => a.scope === 'link') };
      }
    }

    if (vlan !== undefined && !deviceLink) {
      await run.mutate('vlan', IP_COMMANDS.addVlan(link.name, vlan));
      deviceLink = { name: device, mac: link.mac, up: false, addresses: [] };
    }

    if (planned && !(deviceLink && hasAddress(deviceLink, planned.address, planned.prefix))) {
      await run.mutate('address', IP_COMMANDS.addAddress(planned.address, planned.prefix, device));
    }

    if (!link.up) await run.mutate('link-up', IP_COMMANDS.linkUp(link.name));
    if (deviceLink && deviceLink.name !== link.name && !deviceLink.up) {
      await run.mutate('link-up', IP_COMMANDS.linkUp(device));
    }

    return planned ? `${planned.address}/${planned.prefix}` : undefined;
  }

  private async configureRoutes(
    run: NodeSession,
    graph: TopologyGraph,
    node: NodeRecord,
    ipv4Routes: readonly RouteInfo[],
  ): Promise<void> {
    let ipv6Routes: RouteInfo[] | undefined;

    for (const route of node.routes) {
      const subnetService = graph.getNetworkService(route.subnet);
      const hopService = graph.getNetworkService(route.nextHop);
      const subnet = canonicalSubnet(subnetService ? subnetService.subnet ?? '' : route.subnet);
      const gateway = hopService ? hopService.gateway : route.nextHop;
      if (!subnet) {
        throw run.fail('route', `route subnet "${route.subnet}" has no assigned or valid subnet`);
      }
      if (!gateway) {
        throw run.fail('route', `next hop "${route.nextHop}" has no gateway yet`);
      }

      let existing: readonly RouteInfo[] = ipv4Routes;
      if (subnet.includes(':')) {
        ipv6Routes ??= parseRouteList(await run.read('inspect', IP_COMMANDS.listRoutes(6)));
        existing = ipv6Routes;
      }
      const bare = subnet.replace(/\/(32|128)$/, '');
      if (existing.some((r) => r.dst === subnet || r.dst === bare)) continue;
      await run.mutate('route', IP_COMMANDS.addRoute(subnet, gateway));
    }
  }

  private async runPostBootTasks(run: NodeSession, node: NodeRecord, options: ConfigureOptions): Promise<void> {
    if (node.postBootTasks.length === 0) return;
    const marker = options.markerPath ?? DEFAULT_POST_BOOT_MARKER;
    const check = await run.probe(IP_COMMANDS.markerExists(marker));
    if (check.exitCode === 0) return;

    for (const task of node.postBootTasks) {
      if (task.kind === 'execute') {
        await run.mutate('post-boot', task.command);
      } else {
        await run.upload(task.localPath, task.remotePath);
      }
    }
    await run.mutate('post-boot', IP_COMMANDS.touchMarker(marker));
  }
}

/** Command helpers bound to one node, turning failures into ConfigurationError. */
class NodeSession {
  constructor(
    private readonly channel: CommandRunner,
    private readonly target: RemoteTarget,
    private readonly options: ConfigureOptions,
    private readonly log: Logger,
  ) {}

  /** A read-only command that must succeed; returns stdout. */
  async read(step: string, command: string): Promise<string> {
    return (await this.checked(step, command)).stdout;
  }

  async mutate(step: string, command: string): Promise<void> {
    this.log.info('Applying change', { step, command });
    await this.checked(step, command);
  }

  /** A read-only command whose exit code is the answer. */
  async probe(command: string): Promise<ExecResult> {
    const result = await this.exec(command);
    if (result.timedOut) throw this.fail('inspect', `"${command}" timed out`, { command });
    return result;
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    this.log.info('Uploading file', { localPath, remotePath });
    try {
      await this.channel.upload(this.target, localPath, remotePath, this.options.signal);
    } catch (err) {
      if (err instanceof SliceError) throw err;
      throw this.fail('post-boot-upload', err instanceof Error ? err.message : String(err), { localPath, remotePath });
    }
  }

  fail(step: string, message: string, details?: Record<string, unknown>): ConfigurationError {
    return new ConfigurationError(this.target.name, step, message, details);
  }

  private async checked(step: string, command: string): Promise<ExecResult> {
    const result = await this.exec(command);
    if (result.timedOut) {
      throw this.fail(step, `"${command}" timed out`, { command });
    }
    if (result.exitCode !== 0) {
      throw this.fail(step, result.stderr.trim() || `"${command}" exited with ${result.exitCode}`, {
        command,
        exitCode: result.exitCode,
      });
    }
    return result;
  }

  private exec(command: string): Promise<ExecResult> {
    return this.channel.execute(this.target, command, {
      timeoutMs: this.options.commandTimeoutMs,
      signal: this.options.signal,
    });
  }
}
