/**
 * Script harness tests
 */

import { describe, it, expect, vi } from 'vitest';
import { configSchema } from '../src/config/index.js';
import { createScriptLoggers } from '../src/cli.js';

describe('createScriptLoggers', () => {
  const logging = configSchema.parse({ logging: { level: 'debug', format: 'json' } }).logging;

  it('should build the root logger from the logging config', () => {
    const { root } = createScriptLoggers('corrector', logging);

    expect(root.level).toBe('debug');
    expect(root.transports).toHaveLength(1);
  });

  it('should tag entries from the script logger with the script name', () => {
    const { root, logger } = createScriptLoggers('raw-converter', logging);
    const write = vi.spyOn(root, 'write').mockReturnValue(true);

    logger.info('Created assets/ekadashi_data_pst_2026.json', { count: 3 });

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toMatchObject({
      component: 'raw-converter',
      level: 'info',
      message: 'Created assets/ekadashi_data_pst_2026.json',
      count: 3,
    });
    write.mockRestore();
  });
});
