import { describe, it, expect, beforeEach } from 'vitest';
import { DI } from '../../../src/di/tokens.js';
import type { OutputWriter } from '../../../src/infrastructure/output/output-writer.js';
import { InMemoryFileSystem } from '../../fakes/index.js';
import { setupTest, resolve, TEST_OUTPUT_DIR } from '../../di/test-container.js';

describe('OutputWriter', () => {
  let fs: InMemoryFileSystem;
  let writer: OutputWriter;

  beforeEach(async () => {
    fs = new InMemoryFileSystem();
    await setupTest({ fs });
    writer = resolve<OutputWriter>(DI.Infra.OutputWriter);
  });

  it('defaults to passwords.txt in the output directory', () => {
    expect(writer.defaultPath()).toBe(`${TEST_OUTPUT_DIR}/passwords.txt`);
  });

  it('creates the directory and writes CSV for a .csv path', async () => {
    const saved = (await writer.save(['a,b', 'c'], '/exports/nested/batch.csv'))._unsafeUnwrap();

    expect(saved).toEqual({ path: '/exports/nested/batch.csv', format: 'csv', count: 2 });
    expect(fs.read('/exports/nested/batch.csv')).toBe('password\r\n"a,b"\r\nc\r\n');
  });

  it('appends .txt when the path has no extension', async () => {
    const saved = (await writer.save(['x', 'y'], '/exports/batch'))._unsafeUnwrap();

    expect(saved.path).toBe('/exports/batch.txt');
    expect(fs.read('/exports/batch.txt')).toBe('x\ny\n');
  });

  it('reports an unwritable destination', async () => {
    fs.seed('/exports/locked.txt', '').deny('/exports/locked.txt');

    expect((await writer.save(['x'], '/exports/locked.txt'))._unsafeUnwrapErr()).toMatchObject({
      _tag: 'FileAccess',
      path: '/exports/locked.txt',
      code: 'permission_denied',
    });
  });
});
