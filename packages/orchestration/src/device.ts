import { hostname, networkInterfaces } from 'node:os';

/**
 * Identity of the machine running the validations.
 */
export interface Device {
  readonly address: string;
  readonly hostname: string;
}

export interface DeviceProbe {
  hostname(): string;
  networkInterfaces(): ReturnType<typeof networkInterfaces>;
}

const nodeProbe: DeviceProbe = { hostname, networkInterfaces };

export const UNRESOLVED_DEVICE_ADDRESS = 'Unable to retrieve the localhost information';

/**
 * Resolve the local device: host name and first external IPv4 address
 * (loopback when there is none). Failures yield a placeholder identity.
 */
export function resolveDevice(probe: DeviceProbe = nodeProbe): Device {
  try {
    const name = probe.hostname();
    const external = Object.values(probe.networkInterfaces())
      .flatMap((addresses) => addresses ?? [])
      .find((address) => address.family === 'IPv4' && !address.internal);
    return Object.freeze({ address: external?.address ?? '127.0.0.1', hostname: name });
  } catch (error) {
    return Object.freeze({
      address: UNRESOLVED_DEVICE_ADDRESS,
      hostname: error instanceof Error ? error.message : String(error),
    });
  }
}
