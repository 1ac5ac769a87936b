import { describe, it, expect } from 'vitest';
import { parseHeosTxt, deviceFromService, DiscoveredDevice } from '../discovery.js';

describe('Discovery', () => {
  it('parses HEOS TXT record fields', () => {
    const result = parseHeosTxt({ did: 'ABC123', model: 'HEOS 7', vers: '3.34.620', networkid: 'net-1' });
    expect(result).toEqual({ deviceId: 'ABC123', model: 'HEOS 7', version: '3.34.620', serial: undefined, networkId: 'net-1' });
  });

  it('accepts the alternate key names', () => {
    const result = parseHeosTxt({ deviceid: 'ABC123', mod: 'HEOS 1', version: '2.0', serial: 'S-9' });
    expect(result).toMatchObject({ deviceId: 'ABC123', model: 'HEOS 1', version: '2.0', serial: 'S-9' });
  });

  it('maps a resolved service to the CLI port of its IPv4 address', () => {
    const device = deviceFromService({
      name: 'Kitchen',
      addresses: ['fe80::1', '169.254.3.4', '192.168.1.21'],
      txt: { DID: 'ABC123', model: Buffer.from('HEOS 1'), vers: '3.34.620' },
    });

    expect(device).toBeInstanceOf(DiscoveredDevice);
    expect(device).toMatchObject({ name: 'Kitchen', address: '192.168.1.21', port: 1255, deviceId: 'ABC123', model: 'HEOS 1' });
    expect(String(device)).toBe('Kitchen (192.168.1.21:1255) [HEOS 1]');
  });

  it('ignores services without a usable IPv4 address', () => {
    expect(deviceFromService({ name: 'Lounge', addresses: ['fe80::2', '169.254.9.9'], txt: {} })).toBeNull();
  });
});
