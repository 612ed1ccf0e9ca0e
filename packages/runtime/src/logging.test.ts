// Tests for logging helpers

import { describe, it, expect } from 'vitest';
import { createCapturingLogger, createLevelLogger, logDiagnostics } from './logging.js';

describe('createLevelLogger', () => {
  it('drops entries below the minimum level', () => {
    const base = createCapturingLogger();
    const logger = createLevelLogger('warn', base);

    logger.debug('noise');
    logger.info('progress');
    logger.warn('careful', { n: 1 });
    logger.error('broken');

    expect(base.entries.map((entry) => [entry.level, entry.message, entry.data])).toEqual([
      ['warn', 'careful', { n: 1 }],
      ['error', 'broken', undefined],
    ]);
  });
});

describe('logDiagnostics', () => {
  it('logs warnings at warn and everything else at info', () => {
    const logger = createCapturingLogger();
    const repository = { projectKey: 'PROJ', repoSlug: 'repo1' };

    logDiagnostics(logger, [
      { kind: 'empty-group', severity: 'info', repository, groupName: 'devs' },
      { kind: 'zero-output-repository', severity: 'warning', repository },
    ]);

    expect(logger.entries.map((entry) => [entry.level, entry.message, entry.data])).toEqual([
      ['info', 'Group devs has permissions on PROJ/repo1 but no known members', { kind: 'empty-group' }],
      ['warn', 'Repository PROJ/repo1 had grants but produced no effective permissions', { kind: 'zero-output-repository' }],
    ]);
  });
});
