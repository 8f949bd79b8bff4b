/**
 * Topology Graph.
 *
 * Desired-state graph of nodes, components, interfaces and network services.
 * Builder operations enforce structural invariants eagerly and never perform
 * I/O. Authoritative fields are written only through `commitAuthoritative`,
 * which the Reconciler calls with a fully computed patch.
 */

import {
  DuplicateNameError,
  InvalidSpecError,
  InvalidStateError,
  InvalidTopologyError,
  UnsupportedModelError,
} from '../domain/errors';
import { ReservationInfo, UNSUBMITTED_RESERVATION, isSettledReservation } from '../domain/reservation';
import { NetworkServiceRequest, NodeRequest, TopologyRequest } from '../domain/request';
import {
  Capacity,
  ComponentRecord,
  EntityKind,
  InterfaceRecord,
  NETWORK_SERVICE_LAYERS,
  NetworkServiceRecord,
  NetworkServiceType,
  NodeRecord,
  PostBootTask,
  RouteSpec,
} from '../domain/topology';
import { isAddressInSubnet, isValidAddress, normalizeAddress, parseSubnet } from './addressing';
import { CapabilityCatalog, getDefaultCatalog, modelsAvailableAt } from './catalog';
import {
  MAX_VLAN,
  MIN_VLAN,
  ServiceMember,
  ValidationResult,
  checkServiceMembers,
  selectL2Type,
  validateTopology,
} from './validator';

export interface AddNodeOptions {
  site: string;
  image: string;
  capacity?: Capacity;
  instanceType?: string;
  host?: string;
  username?: string;
}

export interface AddNetworkServiceOptions {
  /** User subnet for L2 services, used to allocate interface addresses. */
  subnet?: string;
  /** Ordered list of sites an L2PTP circuit must traverse. */
  ero?: string[];
  /** Facility name for FacilityPort services. */
  facility?: string;
}

export type NodeAuthority = Pick<NodeRecord, 'reservation' | 'managementIp'>;
export type ComponentAuthority = Pick<ComponentRecord, 'reservation' | 'pciAddress'>;
export type InterfaceAuthority = Pick<InterfaceRecord, 'reservation' | 'mac' | 'assignedVlan'>;
export type NetworkServiceAuthority = Pick<NetworkServiceRecord, 'reservation' | 'subnet' | 'gateway'>;

/** A complete set of authoritative writes, applied all at once. */
export interface AuthoritativePatch {
  nodes?: ReadonlyMap<string, NodeAuthority>;
  components?: ReadonlyMap<string, ComponentAuthority>;
  interfaces?: ReadonlyMap<string, InterfaceAuthority>;
  networkServices?: ReadonlyMap<string, NetworkServiceAuthority>;
  /** Configured addresses per interface, written after post-boot configuration. */
  configuredAddresses?: ReadonlyMap<string, readonly string[]>;
}

/** Flat record lists, the persisted form of a graph. */
export interface GraphRecords {
  nodes: NodeRecord[];
  components: ComponentRecord[];
  interfaces: InterfaceRecord[];
  networkServices: NetworkServiceRecord[];
}

/** One entity and its reservation, as seen by state aggregation. */
export interface EntityReservation {
  kind: EntityKind;
  name: string;
  /** Node the entity belongs to; absent for nodes and network services. */
  owner?: string;
  reservation: Readonly<ReservationInfo>;
}

export class TopologyGraph {
  private readonly nodes = new Map<string, NodeRecord>();
  private readonly components = new Map<string, ComponentRecord>();
  private readonly interfaces = new Map<string, InterfaceRecord>();
  private readonly services = new Map<string, NetworkServiceRecord>();
  private submitted = false;
  private reopened = false;
  private invalidated = false;

  constructor(private readonly catalog: CapabilityCatalog = getDefaultCatalog()) {}

  /** Rebuild a graph from persisted records, checking every cross-reference. */
  static fromRecords(
    records: GraphRecords,
    options: { submitted: boolean; catalog?: CapabilityCatalog },
  ): TopologyGraph {
    const graph = new TopologyGraph(options.catalog);
    for (const node of records.nodes) graph.nodes.set(node.name, freeze(node));
    for (const component of records.components) graph.components.set(component.name, freeze(component));
    for (const iface of records.interfaces) graph.interfaces.set(iface.name, freeze(iface));
    for (const service of records.networkServices) graph.services.set(service.name, freeze(service));
    graph.checkReferences();
    graph.submitted = options.submitted;
    return graph;
  }

  toRecords(): GraphRecords {
    return {
      nodes: [...this.nodes.values()],
      components: [...this.components.values()],
      interfaces: [...this.interfaces.values()],
      networkServices: [...this.services.values()],
    };
  }

  // --- Builder operations ---

  addNode(name: string, options: AddNodeOptions): NodeRecord {
    this.assertEditable();
    requireName(name, 'node');
    if (this.nodes.has(name)) throw new DuplicateNameError('node', name);
    if (!options.site) throw new InvalidSpecError(`Node "${name}" needs a site`, name);

    const hasCapacity = options.capacity !== undefined;
    const hasInstanceType = options.instanceType !== undefined && options.instanceType !== '';
    if (hasCapacity === hasInstanceType) {
      throw new InvalidSpecError(
        `Node "${name}" needs exactly one of capacity or instanceType`,
        name,
        { capacity: hasCapacity, instanceType: hasInstanceType },
      );
    }
    if (options.capacity) {
      for (const [field, value] of Object.entries(options.capacity)) {
        if (!Number.isInteger(value) || value <= 0) {
          throw new InvalidSpecError(`Node "${name}" capacity ${field} must be a positive integer`, name);
        }
      }
    }
    if (!(options.image in this.catalog.images)) {
      throw new InvalidSpecError(`Node "${name}" requests unknown image "${options.image}"`, name, {
        knownImages: Object.keys(this.catalog.images).sort(),
      });
    }

    const node: NodeRecord = freeze({
      name,
      site: options.site,
      host: options.host,
      image: options.image,
      capacity: options.capacity ? { ...options.capacity } : undefined,
      instanceType: hasInstanceType ? options.instanceType : undefined,
      username: options.username,
      components: [],
      routes: [],
      postBootTasks: [],
      reservation: UNSUBMITTED_RESERVATION,
    });
    this.nodes.set(name, node);
    return node;
  }

  addComponent(nodeName: string, model: string, shortName?: string): ComponentRecord {
    this.assertEditable();
    const node = this.requireNode(nodeName);
    const spec = this.catalog.models[model];
    if (!spec || (spec.sites && !spec.sites.includes(node.site))) {
      throw new UnsupportedModelError(model, node.site, modelsAvailableAt(this.catalog, node.site));
    }

    const short = shortName ?? this.nextShortName(node);
    requireName(short, 'component');
    const name = `${nodeName}-${short}`;
    if (this.components.has(name)) throw new DuplicateNameError('component', name);

    const interfaceNames: string[] = [];
    for (let port = 1; port <= spec.ports; port++) {
      const iface: InterfaceRecord = freeze({
        name: `${name}-p${port}`,
        node: nodeName,
        component: name,
        port,
        bandwidthGbps: spec.bandwidthGbps,
        reservation: UNSUBMITTED_RESERVATION,
      });
      this.interfaces.set(iface.name, iface);
      interfaceNames.push(iface.name);
    }

    const component: ComponentRecord = freeze({
      name,
      shortName: short,
      node: nodeName,
      model,
      type: spec.type,
      units: 1,
      interfaces: interfaceNames,
      reservation: UNSUBMITTED_RESERVATION,
    });
    this.components.set(name, component);
    this.nodes.set(nodeName, freeze({ ...node, components: [...node.components, name] }));
    return component;
  }

  addNetworkService(
    name: string,
    type: NetworkServiceType,
    interfaceNames: readonly string[],
    options: AddNetworkServiceOptions = {},
  ): NetworkServiceRecord {
    this.assertEditable();
    requireName(name, 'network service');
    if (this.services.has(name)) throw new DuplicateNameError('network service', name);

    const members = this.resolveMembers(name, interfaceNames);
    const reason = checkServiceMembers(type, members, options);
    if (reason) {
      throw new InvalidTopologyError(`Network service "${name}": ${reason}`, name, {
        type,
        interfaces: [...interfaceNames],
      });
    }

    const layer = NETWORK_SERVICE_LAYERS[type];
    if (options.subnet !== undefined) {
      if (layer !== 'L2') {
        throw new InvalidSpecError(`Network service "${name}": ${type} subnets are assigned by the orchestrator`, name);
      }
      if (!parseSubnet(options.subnet)) {
        throw new InvalidSpecError(`Network service "${name}" has an invalid subnet "${options.subnet}"`, name);
      }
    }

    const service: NetworkServiceRecord = freeze({
      name,
      type,
      layer,
      interfaces: [...interfaceNames],
      userSubnet: options.subnet,
      ero: options.ero && options.ero.length > 0 ? [...options.ero] : undefined,
      facility: options.facility,
      reservation: UNSUBMITTED_RESERVATION,
    });
    this.services.set(name, service);
    for (const ifaceName of interfaceNames) {
      const iface = this.requireInterface(ifaceName);
      this.interfaces.set(ifaceName, freeze({ ...iface, networkService: name }));
    }
    return service;
  }

  /** Add an L2 service, choosing its type from where the interfaces live. */
  addL2Network(
    name: string,
    interfaceNames: readonly string[],
    options: AddNetworkServiceOptions = {},
  ): NetworkServiceRecord {
    this.assertEditable();
    const members = this.resolveMembers(name, interfaceNames);
    const type = selectL2Type(members);
    if (!type) {
      throw new InvalidTopologyError(
        `Network service "${name}": L2 networks can join at most two sites`,
        name,
        { sites: [...new Set(members.map((m) => m.site))].sort() },
      );
    }
    return this.addNetworkService(name, type, interfaceNames, options);
  }

  removeNode(name: string): void {
    this.assertNotInvalidated();
    const node = this.requireNode(name);
    const components = node.components.map((c) => this.requireComponent(c));
    const interfaces = components.flatMap((c) => c.interfaces.map((i) => this.requireInterface(i)));

    if (this.submitted) {
      const busy = [node, ...components, ...interfaces].find((e) => !isSettledReservation(e.reservation.state));
      if (busy) {
        throw new InvalidStateError(
          `Cannot remove node "${name}": "${busy.name}" is ${busy.reservation.state}`,
          name,
          { entity: busy.name, state: busy.reservation.state },
        );
      }
    }

    for (const iface of interfaces) {
      if (iface.networkService) this.detach(iface.networkService, iface.name);
      this.interfaces.delete(iface.name);
    }
    for (const component of components) this.components.delete(component.name);
    this.nodes.delete(name);
  }

  removeNetworkService(name: string): void {
    this.assertNotInvalidated();
    const service = this.requireService(name);
    if (this.submitted && !isSettledReservation(service.reservation.state)) {
      throw new InvalidStateError(
        `Cannot remove network service "${name}" while it is ${service.reservation.state}`,
        name,
        { state: service.reservation.state },
      );
    }
    for (const ifaceName of service.interfaces) {
      const iface = this.interfaces.get(ifaceName);
      if (iface) this.interfaces.set(ifaceName, freeze({ ...iface, networkService: undefined }));
    }
    this.services.delete(name);
  }

  addRoute(nodeName: string, route: RouteSpec): NodeRecord {
    this.assertEditable();
    const node = this.requireNode(nodeName);
    if (!route.subnet || !route.nextHop) {
      throw new InvalidSpecError(`Route on node "${nodeName}" needs a subnet and a next hop`, nodeName);
    }
    return this.replaceNode({ ...node, routes: [...node.routes, { ...route }] });
  }

  addPostBootExecute(nodeName: string, command: string): NodeRecord {
    this.assertEditable();
    const node = this.requireNode(nodeName);
    if (!command.trim()) throw new InvalidSpecError(`Post-boot command on node "${nodeName}" is empty`, nodeName);
    const task: PostBootTask = { kind: 'execute', command };
    return this.replaceNode({ ...node, postBootTasks: [...node.postBootTasks, task] });
  }

  addPostBootUpload(nodeName: string, localPath: string, remotePath: string): NodeRecord {
    this.assertEditable();
    const node = this.requireNode(nodeName);
    if (!localPath || !remotePath) {
      throw new InvalidSpecError(`Post-boot upload on node "${nodeName}" needs both paths`, nodeName);
    }
    const task: PostBootTask = { kind: 'upload', localPath, remotePath };
    return this.replaceNode({ ...node, postBootTasks: [...node.postBootTasks, task] });
  }

  setInterfaceVlan(ifaceName: string, vlan: number): InterfaceRecord {
    this.assertEditable();
    const iface = this.requireInterface(ifaceName);
    if (!Number.isInteger(vlan) || vlan < MIN_VLAN || vlan > MAX_VLAN) {
      throw new InvalidSpecError(`VLAN ${vlan} for "${ifaceName}" is outside ${MIN_VLAN}-${MAX_VLAN}`, ifaceName);
    }
    const updated = freeze({ ...iface, vlan });
    this.interfaces.set(ifaceName, updated);
    return updated;
  }

  setInterfaceIp(ifaceName: string, address: string): InterfaceRecord {
    this.assertEditable();
    const iface = this.requireInterface(ifaceName);
    const normalized = normalizeAddress(address);
    if (!normalized || !isValidAddress(address)) {
      throw new InvalidSpecError(`"${address}" is not a valid address for "${ifaceName}"`, ifaceName);
    }
    const service = iface.networkService ? this.services.get(iface.networkService) : undefined;
    if (service?.userSubnet && !isAddressInSubnet(normalized, service.userSubnet)) {
      throw new InvalidSpecError(
        `Address ${normalized} for "${ifaceName}" is outside ${service.userSubnet}`,
        ifaceName,
      );
    }
    const updated = freeze({ ...iface, ipAddress: normalized });
    this.interfaces.set(ifaceName, updated);
    return updated;
  }

  // --- Accessors ---

  getNode(name: string): NodeRecord | undefined {
    return this.nodes.get(name);
  }

  getComponent(name: string): ComponentRecord | undefined {
    return this.components.get(name);
  }

  getInterface(name: string): InterfaceRecord | undefined {
    return this.interfaces.get(name);
  }

  getNetworkService(name: string): NetworkServiceRecord | undefined {
    return this.services.get(name);
  }

  listNodes(): NodeRecord[] {
    return [...this.nodes.values()];
  }

  listComponents(nodeName?: string): ComponentRecord[] {
    const all = [...this.components.values()];
    return nodeName === undefined ? all : all.filter((c) => c.node === nodeName);
  }

  listInterfaces(nodeName?: string): InterfaceRecord[] {
    const all = [...this.interfaces.values()];
    return nodeName === undefined ? all : all.filter((i) => i.node === nodeName);
  }

  listNetworkServices(): NetworkServiceRecord[] {
    return [...this.services.values()];
  }

  /** Login user for a node: its override, else the image default. */
  loginUser(nodeName: string): string | undefined {
    const node = this.nodes.get(nodeName);
    if (!node) return undefined;
    return node.username ?? this.catalog.images[node.image]?.username;
  }

  /** Every entity with its reservation, nodes first. */
  entities(): EntityReservation[] {
    return [
      ...this.listNodes().map((e) => ({ kind: 'node' as const, name: e.name, reservation: e.reservation })),
      ...this.listComponents().map((e) => ({
        kind: 'component' as const,
        name: e.name,
        owner: e.node,
        reservation: e.reservation,
      })),
      ...this.listInterfaces().map((e) => ({
        kind: 'interface' as const,
        name: e.name,
        owner: e.node,
        reservation: e.reservation,
      })),
      ...this.listNetworkServices().map((e) => ({
        kind: 'network service' as const,
        name: e.name,
        reservation: e.reservation,
      })),
    ];
  }

  describeMember(iface: InterfaceRecord): ServiceMember {
    const component = this.components.get(iface.component);
    return {
      name: iface.name,
      site: this.nodes.get(iface.node)?.site ?? '',
      shared: component ? this.catalog.models[component.model]?.shared === true : false,
    };
  }

  validate(): ValidationResult {
    return validateTopology(this);
  }

  toRequest(): TopologyRequest {
    const nodes: NodeRequest[] = this.listNodes().map((node) => ({
      name: node.name,
      site: node.site,
      host: node.host,
      image: node.image,
      capacity: node.capacity ? { ...node.capacity } : undefined,
      instanceType: node.instanceType,
      components: node.components.map((componentName) => {
        const component = this.requireComponent(componentName);
        return {
          name: component.name,
          model: component.model,
          units: component.units,
          interfaces: component.interfaces.map((ifaceName) => {
            const iface = this.requireInterface(ifaceName);
            return { name: iface.name, bandwidthGbps: iface.bandwidthGbps, vlan: iface.vlan };
          }),
        };
      }),
    }));
    const networkServices: NetworkServiceRequest[] = this.listNetworkServices().map((service) => ({
      name: service.name,
      type: service.type,
      interfaces: [...service.interfaces],
      subnet: service.userSubnet,
      ero: service.ero ? [...service.ero] : undefined,
      facility: service.facility,
    }));
    return { nodes, networkServices };
  }

  // --- Lifecycle ---

  isSubmitted(): boolean {
    return this.submitted;
  }

  isInvalidated(): boolean {
    return this.invalidated;
  }

  /** Freeze the desired state once the orchestrator has accepted it. */
  markSubmitted(): void {
    this.submitted = true;
    this.reopened = false;
  }

  /**
   * Open a submitted topology for additions until the next markSubmitted().
   * The returned function puts every record back as it was and closes the
   * graph again.
   */
  reopen(): () => void {
    this.assertNotInvalidated();
    if (!this.submitted) throw new InvalidStateError('Only a submitted topology can be reopened');
    const saved = this.toRecords();
    this.reopened = true;
    return () => {
      this.nodes.clear();
      this.components.clear();
      this.interfaces.clear();
      this.services.clear();
      for (const node of saved.nodes) this.nodes.set(node.name, node);
      for (const component of saved.components) this.components.set(component.name, component);
      for (const iface of saved.interfaces) this.interfaces.set(iface.name, iface);
      for (const service of saved.networkServices) this.services.set(service.name, service);
      this.reopened = false;
    };
  }

  isReopened(): boolean {
    return this.reopened;
  }

  /** Called when the owning slice is deleted; every later builder call fails. */
  invalidate(): void {
    this.invalidated = true;
  }

  /**
   * Apply authoritative fields. Reserved for the Reconciler: every name in
   * the patch is checked before anything is written, so a bad patch leaves
   * the graph untouched.
   */
  commitAuthoritative(patch: AuthoritativePatch): void {
    const missing = [
      ...missingKeys(patch.nodes, this.nodes),
      ...missingKeys(patch.components, this.components),
      ...missingKeys(patch.interfaces, this.interfaces),
      ...missingKeys(patch.networkServices, this.services),
      ...missingKeys(patch.configuredAddresses, this.interfaces),
    ];
    if (missing.length > 0) {
      throw new InvalidStateError(`Patch names entities missing from the graph: ${missing.join(', ')}`, undefined, {
        missing,
      });
    }

    for (const [name, authority] of patch.nodes ?? []) {
      const node = this.requireNode(name);
      this.nodes.set(name, freeze({ ...node, reservation: authority.reservation, managementIp: authority.managementIp }));
    }
    for (const [name, authority] of patch.components ?? []) {
      const component = this.requireComponent(name);
      this.components.set(
        name,
        freeze({ ...component, reservation: authority.reservation, pciAddress: authority.pciAddress }),
      );
    }
    for (const [name, authority] of patch.interfaces ?? []) {
      const iface = this.requireInterface(name);
      this.interfaces.set(
        name,
        freeze({ ...iface, reservation: authority.reservation, mac: authority.mac, assignedVlan: authority.assignedVlan }),
      );
    }
    for (const [name, authority] of patch.networkServices ?? []) {
      const service = this.requireService(name);
      this.services.set(
        name,
        freeze({ ...service, reservation: authority.reservation, subnet: authority.subnet, gateway: authority.gateway }),
      );
    }
    for (const [name, addresses] of patch.configuredAddresses ?? []) {
      const iface = this.requireInterface(name);
      this.interfaces.set(name, freeze({ ...iface, configuredAddresses: [...addresses] }));
    }
  }

  // --- Internals ---

  requireNode(name: string): NodeRecord {
    const node = this.nodes.get(name);
    if (!node) throw new InvalidSpecError(`Unknown node "${name}"`, name);
    return node;
  }

  requireInterface(name: string): InterfaceRecord {
    const iface = this.interfaces.get(name);
    if (!iface) throw new InvalidTopologyError(`Unknown interface "${name}"`, name);
    return iface;
  }

  private requireComponent(name: string): ComponentRecord {
    const component = this.components.get(name);
    if (!component) throw new InvalidTopologyError(`Unknown component "${name}"`, name);
    return component;
  }

  private requireService(name: string): NetworkServiceRecord {
    const service = this.services.get(name);
    if (!service) throw new InvalidTopologyError(`Unknown network service "${name}"`, name);
    return service;
  }

  private resolveMembers(serviceName: string, interfaceNames: readonly string[]): ServiceMember[] {
    const seen = new Set<string>();
    return interfaceNames.map((ifaceName) => {
      if (seen.has(ifaceName)) {
        throw new InvalidTopologyError(
          `Network service "${serviceName}" lists interface "${ifaceName}" twice`,
          serviceName,
        );
      }
      seen.add(ifaceName);
      const iface = this.requireInterface(ifaceName);
      if (iface.networkService) {
        throw new InvalidTopologyError(
          `Interface "${ifaceName}" already belongs to network service "${iface.networkService}"`,
          ifaceName,
          { networkService: iface.networkService },
        );
      }
      return this.describeMember(iface);
    });
  }

  private detach(serviceName: string, ifaceName: string): void {
    const service = this.services.get(serviceName);
    if (!service) return;
    this.services.set(
      serviceName,
      freeze({ ...service, interfaces: service.interfaces.filter((i) => i !== ifaceName) }),
    );
  }

  private replaceNode(node: NodeRecord): NodeRecord {
    const frozen = freeze(node);
    this.nodes.set(node.name, frozen);
    return frozen;
  }

  private nextShortName(node: NodeRecord): string {
    let index = node.components.length + 1;
    while (this.components.has(`${node.name}-c${index}`)) index++;
    return `c${index}`;
  }

  private assertNotInvalidated(): void {
    if (this.invalidated) {
      throw new InvalidStateError('The slice has been deleted; its topology can no longer change');
    }
  }

  private assertEditable(): void {
    this.assertNotInvalidated();
    if (this.submitted && !this.reopened) {
      throw new InvalidStateError('The topology cannot be extended after submission');
    }
  }

  private checkReferences(): void {
    for (const node of this.nodes.values()) {
      for (const c of node.components) this.requireComponent(c);
    }
    for (const component of this.components.values()) {
      this.requireNode(component.node);
      for (const i of component.interfaces) this.requireInterface(i);
    }
    for (const iface of this.interfaces.values()) {
      this.requireComponent(iface.component);
      if (iface.networkService) this.requireService(iface.networkService);
    }
    for (const service of this.services.values()) {
      for (const i of service.interfaces) {
        if (this.requireInterface(i).networkService !== service.name) {
          throw new InvalidTopologyError(
            `Interface "${i}" is listed by "${service.name}" but points elsewhere`,
            i,
          );
        }
      }
    }
  }
}

function requireName(name: string, kind: string): void {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new InvalidSpecError(`A ${kind} name must be a non-empty string`);
  }
}

function missingKeys<V>(patch: ReadonlyMap<string, unknown> | undefined, existing: Map<string, V>): string[] {
  if (!patch) return [];
  return [...patch.keys()].filter((name) => !existing.has(name));
}

function freeze<T extends object>(record: T): T {
  for (const value of Object.values(record)) {
    if (Array.isArray(value)) Object.freeze(value);
  }
  return Object.freeze(record);
}
