/**
 * Firmware release labels
 *
 * Static L4T -> JetPack release table. Lookup is nearest-prefix: the longest
 * key whose dotted components are a prefix of the raw version wins.
 *
 * Keys carry the full major.minor.patch because several minor releases span
 * more than one JetPack label (36.4.3 is 6.2, 36.4.4 is 6.2.1). A patch
 * release missing from the table therefore resolves to 'unknown', never to
 * a neighbouring label; only longer versions such as 36.4.3.1 match by
 * prefix.
 */

export interface FirmwareRelease {
  l4t: string;
  jetpack: string;
}

export const UNKNOWN_FIRMWARE_LABEL = 'unknown';

export const FIRMWARE_RELEASES: readonly FirmwareRelease[] = Object.freeze([
  { l4t: '38.2.0', jetpack: '7.0' },
  { l4t: '36.4.4', jetpack: '6.2.1' },
  { l4t: '36.4.3', jetpack: '6.2' },
  { l4t: '36.4.0', jetpack: '6.1' },
  { l4t: '36.3.0', jetpack: '6.0' },
  { l4t: '36.2.0', jetpack: '6.0 DP' },
  { l4t: '35.6.1', jetpack: '5.1.5' },
  { l4t: '35.6.0', jetpack: '5.1.4' },
  { l4t: '35.5.0', jetpack: '5.1.3' },
  { l4t: '35.4.1', jetpack: '5.1.2' },
  { l4t: '35.3.1', jetpack: '5.1.1' },
  { l4t: '35.2.1', jetpack: '5.1' },
  { l4t: '35.1.0', jetpack: '5.0.2' },
  { l4t: '34.1.1', jetpack: '5.0.1 DP' },
  { l4t: '34.1.0', jetpack: '5.0 DP' },
  { l4t: '32.7.6', jetpack: '4.6.6' },
  { l4t: '32.7.5', jetpack: '4.6.5' },
  { l4t: '32.7.4', jetpack: '4.6.4' },
  { l4t: '32.7.3', jetpack: '4.6.3' },
  { l4t: '32.7.2', jetpack: '4.6.2' },
  { l4t: '32.7.1', jetpack: '4.6.1' },
  { l4t: '32.6.1', jetpack: '4.6' },
  { l4t: '32.5.2', jetpack: '4.5.1' },
  { l4t: '32.5.1', jetpack: '4.5.1' },
  { l4t: '32.5.0', jetpack: '4.5' },
  { l4t: '32.4.4', jetpack: '4.4.1' },
  { l4t: '32.4.3', jetpack: '4.4' },
  { l4t: '32.3.1', jetpack: '4.3' },
  { l4t: '32.2.3', jetpack: '4.2.3' },
  { l4t: '32.2.1', jetpack: '4.2.2' },
  { l4t: '32.2.0', jetpack: '4.2.1' },
  { l4t: '32.1.0', jetpack: '4.2' },
  { l4t: '31.1.0', jetpack: '4.1.1' },
  { l4t: '31.0.2', jetpack: '4.1' },
].map((release) => Object.freeze(release)));

function components(version: string): string[] {
  return version
    .trim()
    .split('.')
    .filter((part) => part !== '');
}

export function firmwareLabelFor(version: string): string {
  const raw = components(version);
  if (raw.length === 0) return UNKNOWN_FIRMWARE_LABEL;

  let best: FirmwareRelease | null = null;
  let bestLength = 0;
  for (const release of FIRMWARE_RELEASES) {
    const key = components(release.l4t);
    if (key.length > raw.length || key.length <= bestLength) continue;
    if (key.every((part, position) => part === raw[position])) {
      best = release;
      bestLength = key.length;
    }
  }

  return best === null ? UNKNOWN_FIRMWARE_LABEL : best.jetpack;
}

/** Major component of an L4T version, or null when it is not numeric */
export function firmwareMajor(version: string): number | null {
  const major = parseInt(components(version)[0] ?? '', 10);
  return Number.isFinite(major) ? major : null;
}
