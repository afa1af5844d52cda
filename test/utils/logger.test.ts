import { describe, expect, it, vi } from 'vitest';
import chalk from 'chalk';
import { Logger } from '@/utils/logger';

function spyConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

describe('Logger', () => {
  it('prefixes messages', () => {
    const { log } = spyConsole();

    new Logger({ prefix: '[HTTP]' }).info('--> GET /a');

    expect(log).toHaveBeenCalledWith(chalk.blue('ℹ'), '[HTTP] --> GET /a');
  });

  it('marks warnings', () => {
    const { log } = spyConsole();

    new Logger().warn('careful');

    expect(log).toHaveBeenCalledWith(chalk.yellow('⚠'), 'careful');
  });

  it('prints raw messages untouched', () => {
    const { log } = spyConsole();

    new Logger({ prefix: '[HTTP]' }).raw('Accept: */*');

    expect(log).toHaveBeenCalledWith('Accept: */*');
  });

  it('only prints debug output when enabled', () => {
    const { log } = spyConsole();
    const quiet = new Logger({ enableDebug: false });

    quiet.debug('hidden');
    expect(log).not.toHaveBeenCalled();

    quiet.setDebugEnabled(true);
    quiet.debug('shown');
    expect(log).toHaveBeenCalledTimes(1);
    expect(quiet.isDebugEnabled()).toBe(true);
  });

  it('prints the stack of an error only in debug mode', () => {
    const { error } = spyConsole();
    const failure = new Error('connection reset');

    new Logger({ enableDebug: false }).error('request failed', failure);
    expect(error).toHaveBeenCalledTimes(1);

    new Logger({ enableDebug: true }).error('request failed', failure);
    expect(error).toHaveBeenCalledTimes(3);
  });

  it('creates children that share the debug setting', () => {
    const { log } = spyConsole();
    const child = new Logger({ enableDebug: true }).child('[AUTH]');

    child.debug('resolved');

    expect(child.isDebugEnabled()).toBe(true);
    expect(log).toHaveBeenCalledWith(chalk.gray('🐛'), chalk.gray('[AUTH] resolved'));
  });
});
