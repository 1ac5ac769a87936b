import Bonjour, { type Service } from 'bonjour-service';
import { HEOS_PORT } from './options.js';
import { isRecord } from './util/values.js';

export const HEOS_SERVICE_TYPE = 'heos-audio';

export interface HeosTxtRecord {
  deviceId: string;
  model: string;
  version: string;
  serial?: string;
  networkId?: string;
}

/** Read the TXT record of a `_heos-audio._tcp` service. Firmware versions disagree on key names. */
export function parseHeosTxt(txt: Record<string, string>): HeosTxtRecord {
  return {
    deviceId: txt.did ?? txt.deviceid ?? '',
    model: txt.model ?? txt.mod ?? 'Unknown',
    version: txt.vers ?? txt.version ?? '',
    serial: txt.ser ?? txt.serial,
    networkId: txt.networkid,
  };
}

function txtStrings(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key.toLowerCase()] = entry;
    else if (Buffer.isBuffer(entry)) result[key.toLowerCase()] = entry.toString('utf-8');
  }
  return result;
}

export interface DiscoveredDeviceInfo {
  name: string;
  address: string;
  /** Port of the CLI service, not the advertised audio port */
  port: number;
  deviceId: string;
  model: string;
  version: string;
  serial?: string;
}

export class DiscoveredDevice {
  readonly name: string;
  readonly address: string;
  readonly port: number;
  readonly deviceId: string;
  readonly model: string;
  readonly version: string;
  readonly serial?: string;

  constructor(info: DiscoveredDeviceInfo) {
    this.name = info.name;
    this.address = info.address;
    this.port = info.port;
    this.deviceId = info.deviceId;
    this.model = info.model;
    this.version = info.version;
    this.serial = info.serial;
  }

  toString(): string {
    return `${this.name} (${this.address}:${this.port}) [${this.model}]`;
  }
}

/** Map a resolved mDNS service to a device; null when it has no usable IPv4 address. */
export function deviceFromService(service: Pick<Service, 'name' | 'addresses' | 'txt'>): DiscoveredDevice | null {
  const address = service.addresses?.find(
    (a) => a.includes('.') && !a.startsWith('169.254'),
  );
  if (!address) return null;

  const parsed = parseHeosTxt(txtStrings(service.txt));
  return new DiscoveredDevice({
    name: service.name,
    address,
    port: HEOS_PORT,
    deviceId: parsed.deviceId,
    model: parsed.model,
    version: parsed.version,
    serial: parsed.serial,
  });
}

export interface ScanOptions {
  timeout?: number;
  filter?: (device: DiscoveredDevice) => boolean;
}

export async function scan(options: ScanOptions = {}): Promise<DiscoveredDevice[]> {
  const timeout = options.timeout ?? 5000;
  const devices = new Map<string, DiscoveredDevice>();

  return new Promise((resolve) => {
    const bonjour = new Bonjour();

    const browser = bonjour.find({ type: HEOS_SERVICE_TYPE, protocol: 'tcp' }, (service: Service) => {
      const device = deviceFromService(service);
      if (!device) return;
      const key = device.deviceId || device.address;
      if (!devices.has(key)) devices.set(key, device);
    });

    setTimeout(() => {
      browser.stop();
      bonjour.destroy();

      let result = Array.from(devices.values());
      if (options.filter) {
        result = result.filter(options.filter);
      }
      resolve(result.sort((a, b) => a.name.localeCompare(b.name)));
    }, timeout);
  });
}
