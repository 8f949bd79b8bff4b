import {
  IP_COMMANDS,
  configuredAddresses,
  findLinkByMac,
  hasAddress,
  managementDevice,
  parseAddrList,
  parseRouteList,
} from '../../src/configure/ip-commands';

const ADDR_LIST = JSON.stringify([
  {
    ifname: 'ens3',
    address: 'FA:16:3E:00:00:01',
    flags: ['BROADCAST', 'MULTICAST', 'UP', 'LOWER_UP'],
    addr_info: [
      { family: 'inet', local: '10.20.1.10', prefixlen: 24, scope: 'global' },
      { family: 'inet6', local: 'fe80::f816:3eff:fe00:1', prefixlen: 64, scope: 'link' },
    ],
  },
  { ifname: 'ens7', address: '02:5c:01:00:00:01', flags: ['BROADCAST', 'MULTICAST'], addr_info: [] },
  {
    ifname: 'ens7.200',
    address: '02:5c:01:00:00:01',
    flags: ['UP'],
    addr_info: [{ family: 'inet6', local: '2001:db8:0:0::5', prefixlen: 64, scope: 'global' }],
  },
  { ifname: 42 },
]);

describe('ip command output parsing', () => {
  test('parses links, flags and addresses', () => {
    const links = parseAddrList(ADDR_LIST);
    expect(links.map((l) => [l.name, l.mac, l.up])).toEqual([
      ['ens3', 'fa:16:3e:00:00:01', true],
      ['ens7', '02:5c:01:00:00:01', false],
      ['ens7.200', '02:5c:01:00:00:01', true],
    ]);
    expect(links[0].addresses[0]).toEqual({ family: 4, address: '10.20.1.10', prefix: 24, scope: 'global' });
    expect(configuredAddresses(links[0])).toHaveLength(1);
  });

  test('matches a MAC on the parent device before its VLANs', () => {
    const links = parseAddrList(ADDR_LIST);
    expect(findLinkByMac(links, '02:5C:01:00:00:01')?.name).toBe('ens7');
    expect(findLinkByMac(links, '02:5c:ff:00:00:01')).toBeUndefined();
  });

  test('compares addresses in canonical form', () => {
    const vlan = parseAddrList(ADDR_LIST)[2];
    expect(hasAddress(vlan, '2001:db8::5', 64)).toBe(true);
    expect(hasAddress(vlan, '2001:db8::5', 48)).toBe(false);
  });

  test('finds the management device from the default route', () => {
    const routes = parseRouteList(
      JSON.stringify([
        { dst: 'default', gateway: '10.20.1.1', dev: 'ens3' },
        { dst: '10.20.1.0/24', dev: 'ens3' },
      ]),
    );
    expect(managementDevice(routes)).toBe('ens3');
    expect(routes[1]).toEqual({ dst: '10.20.1.0/24', gateway: undefined, dev: 'ens3' });
  });

  test('empty output is an empty list; anything else must be a JSON array', () => {
    expect(parseRouteList('  \n')).toEqual([]);
    expect(() => parseAddrList('{"ifname":"ens3"}')).toThrow('Expected a JSON array from ip addr list');
    expect(() => parseRouteList('not json')).toThrow(/^Could not parse ip route list output: /);
  });
});

describe('IP_COMMANDS', () => {
  test('mutating commands run through sudo', () => {
    expect(IP_COMMANDS.addVlan('ens7', 200)).toBe('sudo ip link add link ens7 name ens7.200 type vlan id 200');
    expect(IP_COMMANDS.addAddress('10.10.0.1', 24, 'ens7')).toBe('sudo ip addr add 10.10.0.1/24 dev ens7');
    expect(IP_COMMANDS.addRoute('10.128.0.0/10', '10.129.2.1')).toBe('sudo ip route add 10.128.0.0/10 via 10.129.2.1');
    expect(IP_COMMANDS.listRoutes(6)).toBe('ip -6 -j route list');
  });
});
