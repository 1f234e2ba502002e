/**
 * Board Identity Collector
 *
 * Merges three sources, each only filling fields the previous left empty:
 * the L4T release manifest, device-tree strings, then a match of the
 * device-tree compatible list against known module part numbers.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readOrDefault, readString, resolvePath, parseKeyValues } from '../sysfs/index.js';
import type { BoardIdentity } from '../types/index.js';
import { firmwareLabelFor } from './firmware-releases.js';

export const RELEASE_MANIFEST = '/etc/nv_tegra_release';

export const DEVICE_TREE_CANDIDATES = Object.freeze([
  '/sys/firmware/devicetree/base',
  '/proc/device-tree',
  '/sys/devices/soc0/firmware/devicetree/base',
]);

/** Module part numbers in device-tree compatible strings */
export const COMPATIBLE_MODELS: ReadonlyArray<readonly [string, string]> = Object.freeze([
  ['p3834', 'NVIDIA Jetson AGX Thor'],
  ['p3767', 'NVIDIA Jetson Orin NX / Orin Nano'],
  ['p3701', 'NVIDIA Jetson AGX Orin'],
  ['p3668', 'NVIDIA Jetson Xavier NX'],
  ['p2888', 'NVIDIA Jetson AGX Xavier'],
  ['p3310', 'NVIDIA Jetson TX2'],
  ['p3489', 'NVIDIA Jetson TX2'],
  ['p2180', 'NVIDIA Jetson TX1'],
  ['p3448', 'NVIDIA Jetson Nano'],
  ['p3450', 'NVIDIA Jetson Nano'],
] as const);

export interface ReleaseManifest {
  model: string;
  firmwareVersion: string;
  firmwareLabel: string;
  serial: string;
}

/**
 * Parses both manifest layouts: `KEY=value` lines, and the stock header
 * `# R36 (release), REVISION: 4.3, GCID: ...` which yields version 36.4.3.
 */
export function parseReleaseManifest(text: string): ReleaseManifest {
  const entries = parseKeyValues(text, '=');
  const manifest: ReleaseManifest = {
    model: entries.get('BOARD') ?? '',
    firmwareVersion: entries.get('L4T_VERSION') ?? '',
    firmwareLabel: entries.get('JETPACK_VERSION') ?? '',
    serial: entries.get('SERIAL_NUMBER') ?? '',
  };

  if (manifest.firmwareVersion === '') {
    const header = /#\s*R(\d+)\s*\(release\),\s*REVISION:\s*(\d+)(?:\.(\d+))?/i.exec(text);
    if (header) {
      manifest.firmwareVersion = `${header[1] ?? ''}.${header[2] ?? '0'}.${header[3] ?? '0'}`;
    }
  }

  return manifest;
}

export function modelFromCompatible(compatible: string): string {
  for (const entry of compatible.split('\0')) {
    const lowered = entry.trim().toLowerCase();
    if (lowered === '') continue;
    for (const [partNumber, model] of COMPATIBLE_MODELS) {
      if (lowered.includes(partNumber)) return model;
    }
  }
  return '';
}

export class BoardIdentityCollector {
  private readonly deviceTree: string | null;

  constructor(private readonly sysfs: Sysfs) {
    this.deviceTree = resolvePath(sysfs, DEVICE_TREE_CANDIDATES);
  }

  collect(): BoardIdentity {
    const manifest = readOrDefault(this.sysfs, RELEASE_MANIFEST, parseReleaseManifest, {
      model: '',
      firmwareVersion: '',
      firmwareLabel: '',
      serial: '',
    });

    let { model, serial } = manifest;
    if (this.deviceTree !== null) {
      if (model === '') model = readString(this.sysfs, `${this.deviceTree}/model`);
      if (serial === '') serial = readString(this.sysfs, `${this.deviceTree}/serial-number`);
      if (model === '') {
        model = readOrDefault(this.sysfs, `${this.deviceTree}/compatible`, (text) => modelFromCompatible(text) || null, '');
      }
    }

    return {
      model,
      firmwareVersion: manifest.firmwareVersion,
      firmwareLabel:
        manifest.firmwareLabel !== '' ? manifest.firmwareLabel : firmwareLabelFor(manifest.firmwareVersion),
      serial,
    };
  }
}
