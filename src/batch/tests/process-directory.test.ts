import {
  mkdir,
  readFile,
  readdir,
  stat,
  symlink,
  writeFile
} from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { processDirectory } from '..';
import {
  DirectoryCreateError,
  DirectoryReadError,
  FileWriteError
} from '../../errors';
import { transform } from '../../rewriter';
import type { Workspace } from './helpers';
import { createWorkspace, silentLogger } from './helpers';

const NODE_A = '(nodes: [(name: "A", ty: "Clip", inner: (clip: "a.anim.ron"))])';
const NODE_B = '(nodes: [(name: "B", ty: "Speed", inner: (speed: 2.0))])';

describe('processDirectory', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    await workspace.dispose();
  });

  async function seedInput(): Promise<string> {
    const inputDir = workspace.resolve('animation_graphs_old');
    await mkdir(inputDir);
    await writeFile(workspace.resolve('animation_graphs_old', 'a.ron'), NODE_A);
    await writeFile(workspace.resolve('animation_graphs_old', 'b.ron'), NODE_B);
    await writeFile(workspace.resolve('animation_graphs_old', 'c.txt'), NODE_A);
    await mkdir(workspace.resolve('animation_graphs_old', 'nested.ron'));
    return inputDir;
  }

  test('rewrites every .ron file and skips everything else', async () => {
    const inputDir = await seedInput();
    const outputDir = workspace.resolve('animation_graphs');

    await processDirectory(inputDir, outputDir, { logger: silentLogger });

    expect((await readdir(outputDir)).sort()).toEqual(['a.ron', 'b.ron']);
    expect(await readFile(workspace.resolve('animation_graphs', 'a.ron'), 'utf8')).toBe(
      transform(NODE_A)
    );
    expect(await readFile(workspace.resolve('animation_graphs', 'b.ron'), 'utf8')).toBe(
      transform(NODE_B)
    );
  });

  test('reports each rewritten file and returns the batch result', async () => {
    const inputDir = await seedInput();
    const outputDir = workspace.resolve('animation_graphs');
    const reported: string[] = [];

    const result = await processDirectory(inputDir, outputDir, {
      logger: silentLogger,
      reporter: { fileTransformed: fileName => reported.push(fileName) }
    });

    expect([...reported].sort()).toEqual(['a.ron', 'b.ron']);
    expect(result.files.map(file => file.fileName)).toEqual(reported);
    expect(result.files.map(file => file.fragmentCount)).toEqual([1, 1]);
    expect(result).toMatchObject({ inputDir, outputDir });
  });

  test('creates missing parents of the output directory', async () => {
    const inputDir = await seedInput();
    const outputDir = workspace.resolve('out', 'deep', 'graphs');

    await processDirectory(inputDir, outputDir, { logger: silentLogger });

    expect((await readdir(outputDir)).sort()).toEqual(['a.ron', 'b.ron']);
  });

  test('honours a custom extension', async () => {
    const inputDir = await seedInput();
    const outputDir = workspace.resolve('animation_graphs');

    await processDirectory(inputDir, outputDir, {
      extension: '.txt',
      logger: silentLogger
    });

    expect(await readdir(outputDir)).toEqual(['c.txt']);
  });

  test('fails with an I/O error when the input directory is missing, leaving only an empty output directory', async () => {
    const outputDir = workspace.resolve('animation_graphs');

    const error = await processDirectory(workspace.resolve('missing'), outputDir, {
      logger: silentLogger
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DirectoryReadError);
    expect(error).toMatchObject({ code: 'ENOENT', operation: 'list' });
    expect((await stat(outputDir)).isDirectory()).toBe(true);
    expect(await readdir(outputDir)).toEqual([]);
  });

  test('fails with an I/O error when the input path is a file', async () => {
    const inputPath = workspace.resolve('graph.ron');
    await writeFile(inputPath, NODE_A);

    const error = await processDirectory(inputPath, workspace.resolve('animation_graphs'), {
      logger: silentLogger
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DirectoryReadError);
    expect(error).toMatchObject({ code: 'ENOTDIR' });
  });

  test('skips symbolic links whose name ends with the extension', async () => {
    const inputDir = await seedInput();
    const outputDir = workspace.resolve('animation_graphs');
    await symlink('c.txt', workspace.resolve('animation_graphs_old', 'link.ron'));

    const result = await processDirectory(inputDir, outputDir, {
      logger: silentLogger
    });

    expect((await readdir(outputDir)).sort()).toEqual(['a.ron', 'b.ron']);
    expect(result.files.map(file => file.fileName).sort()).toEqual([
      'a.ron',
      'b.ron'
    ]);
  });

  test('stops at the first failing file and leaves later files unwritten', async () => {
    const inputDir = workspace.resolve('animation_graphs_old');
    const outputDir = workspace.resolve('animation_graphs');
    await mkdir(inputDir);
    for (const name of ['a.ron', 'b.ron', 'c.ron']) {
      await writeFile(workspace.resolve('animation_graphs_old', name), NODE_A);
    }
    await mkdir(workspace.resolve('animation_graphs', 'b.ron'), {
      recursive: true
    });
    const reported: string[] = [];

    const error = await processDirectory(inputDir, outputDir, {
      logger: silentLogger,
      reporter: { fileTransformed: fileName => reported.push(fileName) }
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileWriteError);
    expect(error).toMatchObject({
      code: 'EISDIR',
      operation: 'write',
      path: workspace.resolve('animation_graphs', 'b.ron')
    });

    const order = await readdir(inputDir);
    const failedAt = order.indexOf('b.ron');
    const before = order.slice(0, failedAt);
    const after = order.slice(failedAt + 1);

    expect(reported).toEqual(before);
    const written = await readdir(outputDir);
    expect([...written].sort()).toEqual([...before, 'b.ron'].sort());
    for (const name of after) {
      expect(written).not.toContain(name);
    }
  });

  test('fails with DirectoryCreateError before listing the input', async () => {
    const blocker = workspace.resolve('graph.ron');
    await writeFile(blocker, NODE_A);
    const outputDir = workspace.resolve('graph.ron', 'out');

    // The input does not exist: listing it first would raise DirectoryReadError.
    const error = await processDirectory(workspace.resolve('missing'), outputDir, {
      logger: silentLogger
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DirectoryCreateError);
    expect(error).toMatchObject({
      code: 'ENOTDIR',
      operation: 'mkdir',
      path: outputDir
    });
  });
});
