/**
 * Screen views
 *
 * Projects a Sample onto the rows one screen shows. The renderer only lays
 * these out; every number is already formatted here.
 */

import { SCREEN_TITLES, type Sample, type ScreenState } from '../types/index.js';
import { CONTROL_ITEMS, type ControlPanel, type ControlItem } from './control-panel.js';
import {
  formatBytes,
  formatCelsius,
  formatFrequency,
  formatMilliwatts,
  formatPercent,
  formatWatts,
  usedShare,
} from './format.js';

export interface ViewRow {
  label: string;
  value: string;
  /** Optional bar, 0-100 */
  gauge?: number;
  /** Highlighted (Control screen cursor) */
  selected?: boolean;
}

export interface ViewSection {
  heading: string;
  rows: ViewRow[];
}

export interface ScreenView {
  screen: ScreenState;
  title: string;
  sections: ViewSection[];
  /** One-line status, e.g. the last control outcome */
  status: string;
}

type Projector = (sample: Sample, control: ControlPanel) => ViewSection[];

function cpuRows(sample: Sample): ViewRow[] {
  return sample.cpu.cores.map((core) => ({
    label: `CPU${core.index}`,
    value: `${formatPercent(core.usage)} ${formatFrequency(core.frequency)} ${core.governor}`,
    gauge: core.usage,
  }));
}

function ramRow(sample: Sample): ViewRow {
  return {
    label: 'RAM',
    value: `${formatBytes(sample.memory.ramUsed)} / ${formatBytes(sample.memory.ramTotal)}`,
    gauge: usedShare(sample.memory.ramUsed, sample.memory.ramTotal),
  };
}

function swapRow(sample: Sample): ViewRow {
  return {
    label: 'Swap',
    value: `${formatBytes(sample.memory.swapUsed)} / ${formatBytes(sample.memory.swapTotal)}`,
    gauge: usedShare(sample.memory.swapUsed, sample.memory.swapTotal),
  };
}

function acceleratorUsageRow(sample: Sample): ViewRow {
  return { label: 'GPU', value: formatPercent(sample.accelerator.usage), gauge: sample.accelerator.usage };
}

const overview: Projector = (sample) => [
  {
    heading: 'Utilization',
    rows: [
      { label: 'CPU', value: formatPercent(sample.cpu.usage), gauge: sample.cpu.usage },
      acceleratorUsageRow(sample),
      ramRow(sample),
      swapRow(sample),
    ],
  },
  {
    heading: 'Board',
    rows: [
      { label: 'CPU temp', value: formatCelsius(sample.thermal.cpu) },
      { label: 'GPU temp', value: formatCelsius(sample.thermal.gpu) },
      { label: 'Power', value: formatWatts(sample.power.total) },
      { label: 'Fan', value: `${formatPercent(sample.cooling.duty)} (${sample.cooling.mode})`, gauge: sample.cooling.duty },
      { label: 'Processes', value: String(sample.processes.total) },
    ],
  },
];

const cpu: Projector = (sample) => [
  { heading: `Total ${formatPercent(sample.cpu.usage)}`, rows: cpuRows(sample) },
];

const accelerator: Projector = (sample) => {
  const { accelerator: gpu } = sample;
  const rows: ViewRow[] = [
    acceleratorUsageRow(sample),
    { label: 'Frequency', value: `${formatFrequency(gpu.frequency)} / ${formatFrequency(gpu.maxFrequency)}` },
    { label: 'Temperature', value: formatCelsius(gpu.temperature) },
    { label: 'Governor', value: gpu.governor },
    { label: 'Source', value: gpu.source },
  ];
  if (gpu.memoryTotal > 0) {
    rows.push({
      label: 'Memory',
      value: `${formatBytes(gpu.memoryUsed)} / ${formatBytes(gpu.memoryTotal)}`,
      gauge: usedShare(gpu.memoryUsed, gpu.memoryTotal),
    });
  }

  const sections: ViewSection[] = [{ heading: 'Accelerator', rows }];
  if (gpu.processes.length > 0) {
    sections.push({
      heading: 'Processes',
      rows: gpu.processes.map((process) => ({ label: String(process.pid), value: `${process.name} ${formatBytes(process.memory)}` })),
    });
  }
  sections.push({
    heading: 'Engines',
    rows: sample.engines.map((engine) => ({
      label: engine.name.toUpperCase(),
      value: engine.online ? formatFrequency(engine.frequency) : 'off',
    })),
  });
  return sections;
};

const memory: Projector = (sample) => {
  const rows: ViewRow[] = [
    ramRow(sample),
    { label: 'Cached', value: formatBytes(sample.memory.ramCached) },
    swapRow(sample),
    { label: 'Swap cached', value: formatBytes(sample.memory.swapCached) },
  ];
  if (sample.memory.sramTotal > 0) {
    rows.push({
      label: 'SRAM',
      value: `${formatBytes(sample.memory.sramUsed)} / ${formatBytes(sample.memory.sramTotal)} (lfb ${formatBytes(sample.memory.sramLargestFreeBlock)})`,
      gauge: usedShare(sample.memory.sramUsed, sample.memory.sramTotal),
    });
  }
  return [{ heading: 'Memory', rows }];
};

const power: Projector = (sample) => [
  {
    heading: `Total ${formatWatts(sample.power.total)}`,
    rows: sample.power.rails.map((rail) => ({
      label: rail.name,
      value: `${formatMilliwatts(rail.power)} (${Math.round(rail.current)} mA @ ${Math.round(rail.voltage)} mV)`,
    })),
  },
];

const temperature: Projector = (sample) => [
  {
    heading: 'Thermal zones',
    rows: sample.thermal.zones.map((zone) => ({
      label: zone.name === '' ? `zone${zone.index}` : zone.name,
      value:
        zone.critical > 0
          ? `${formatCelsius(zone.current)} (crit ${formatCelsius(zone.critical)})`
          : formatCelsius(zone.current),
    })),
  },
];

const CONTROL_LABELS: Readonly<Record<ControlItem, string>> = Object.freeze({
  'cooling-duty': 'Fan duty',
  boost: 'Boost (jetson_clocks)',
  profile: 'Power mode (nvpmodel)',
});

const control: Projector = (sample, panel) => {
  const profileName = (id: number | null): string =>
    id === null ? 'unknown' : (sample.profile.profiles.find((profile) => profile.id === id)?.name ?? `mode ${id}`);

  const values: Record<ControlItem, string> = {
    'cooling-duty': `${formatPercent(sample.cooling.duty)} -> ${formatPercent(panel.dutyTarget)}`,
    boost: sample.profile.boost.enabled ? 'on' : 'off',
    profile: `${profileName(sample.profile.current)} -> ${profileName(panel.profileTarget)}`,
  };

  return [
    {
      heading: 'Control',
      rows: CONTROL_ITEMS.map((item) => ({
        label: CONTROL_LABELS[item],
        value: values[item],
        selected: panel.selected === item,
      })),
    },
  ];
};

const info: Projector = (sample) => [
  {
    heading: 'Board',
    rows: [
      { label: 'Model', value: sample.board.model || 'unknown' },
      { label: 'JetPack', value: sample.board.firmwareLabel },
      { label: 'L4T', value: sample.board.firmwareVersion || 'unknown' },
      { label: 'Serial', value: sample.board.serial || 'unknown' },
      { label: 'Accelerator', value: sample.accelerator.source },
    ],
  },
  {
    heading: 'Power modes',
    rows: sample.profile.profiles.map((profile) => ({
      label: String(profile.id),
      value: profile.id === sample.profile.current ? `${profile.name} (active)` : profile.name,
    })),
  },
];

const PROJECTORS: Readonly<Record<ScreenState, Projector>> = Object.freeze({
  overview,
  cpu,
  accelerator,
  memory,
  power,
  temperature,
  control,
  info,
});

export function projectView(screen: ScreenState, sample: Sample, panel: ControlPanel): ScreenView {
  const outcome = panel.outcome;
  return {
    screen,
    title: SCREEN_TITLES[screen],
    sections: PROJECTORS[screen](sample, panel),
    status: outcome === null ? '' : `${outcome.ok ? 'ok' : 'failed'}: ${outcome.message}`,
  };
}
