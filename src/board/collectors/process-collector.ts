/**
 * Process Collector
 *
 * Counts running processes as the numeric entries of /proc. Per-process
 * accelerator usage comes from the accelerator collector.
 */

import type { Sysfs } from '../sysfs/index.js';
import { listOrEmpty } from '../sysfs/index.js';
import type { ProcessReading } from '../types/index.js';

const PROC = '/proc';

export class ProcessCollector {
  constructor(private readonly sysfs: Sysfs) {}

  collect(): ProcessReading {
    const total = listOrEmpty(this.sysfs, PROC).filter((name) => /^\d+$/.test(name)).length;
    return { total };
  }
}
