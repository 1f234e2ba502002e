/**
 * Unit Tests for the Process Collector
 */

import { describe, it, expect } from 'vitest';
import { ProcessCollector } from './process-collector.js';
import { VirtualSysfs } from '../test-setup.js';

describe('ProcessCollector', () => {
  it('should count only the numeric entries of /proc', () => {
    const sysfs = new VirtualSysfs({
      '/proc/1/comm': 'systemd\n',
      '/proc/42/comm': 'sshd\n',
      '/proc/1337/comm': 'boardtop\n',
      '/proc/stat': 'cpu  0 0 0 0\n',
      '/proc/self/comm': 'boardtop\n',
      '/proc/sys/kernel/pid_max': '4194304\n',
    });

    expect(new ProcessCollector(sysfs).collect()).toEqual({ total: 3 });
  });

  it('should report zero when /proc cannot be listed', () => {
    expect(new ProcessCollector(new VirtualSysfs()).collect()).toEqual({ total: 0 });
  });
});
