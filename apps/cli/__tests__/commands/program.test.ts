import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CliContainer } from '../../src/container/cli-container';
import { createProgram } from '../../src/program';
import { CliUsageError } from '../../src/utils/errors';

describe('deep-research CLI', () => {
  let root: string;
  let container: CliContainer;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'deep-research-cli-'));
    mkdirSync(join(root, 'research'));
    writeFileSync(
      join(root, 'research', 'notes.md'),
      '# Storage\n\nKeep below 25 degrees.',
    );
    writeFileSync(
      join(root, 'research', 'products.csv'),
      'Company,BrandName\nAlpha Pharma,TIAROTEC\nBeta Labs,Spiriva\n',
    );
    container = new CliContainer({
      RESEARCH_STORAGE_ROOT: root,
      RESEARCH_BUCKET: 'research',
    });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('should reject tabular calls without a query or objective', async () => {
    await expect(
      createProgram(container).parseAsync(['tabular', 'products.csv'], {
        from: 'user',
      }),
    ).rejects.toThrow(new CliUsageError('Provide --query or --objective.'));
  });

  it('should print the document text', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createProgram(container).parseAsync(['document', 'notes.md'], {
      from: 'user',
    });

    expect(log).toHaveBeenLastCalledWith('# Storage\n\nKeep below 25 degrees.');
  });

  it('should print a direct query report', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createProgram(container).parseAsync(
      [
        'tabular',
        'products.csv',
        '--query',
        'SELECT COUNT(*) AS total FROM current_csv_table',
      ],
      { from: 'user' },
    );

    const output = log.mock.lastCall?.[0];
    expect(output).toContain('**File:** products.csv (2 rows, 2 columns)');
    expect(output).toContain('"total": 2');
  });
});
