import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Readable } from 'stream';
import {
  isCompressedArtifact,
  openArtifactReader,
  openArtifactWriter,
  openStreamPair,
} from '../../src/io/artifact-streams.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { mkTestDir } from '../helpers/temp-dir.js';

async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

async function writeArtifact(filePath: string, content: string): Promise<void> {
  const writer = expectOk(await openArtifactWriter(filePath), `opening ${filePath}`);
  writer.stream.end(content);
  expectOk(await writer.done, `flushing ${filePath}`);
}

describe('artifact streams', () => {
  let dir: { root: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await mkTestDir('golden-streams-');
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('recognizes compressed artifacts by their final extension', () => {
    expect(isCompressedArtifact('out.gz')).toBe(true);
    expect(isCompressedArtifact('nested/archive.tar.gz')).toBe(true);
    expect(isCompressedArtifact('out.gz.txt')).toBe(false);
    expect(isCompressedArtifact('gz')).toBe(false);
    expect(isCompressedArtifact('out.GZ')).toBe(false);
  });

  it('writes raw files byte for byte', async () => {
    const filePath = path.join(dir.root, 'plain.txt');
    await writeArtifact(filePath, 'plain\ncontent\n');

    expect(await fs.readFile(filePath, 'utf8')).toBe('plain\ncontent\n');
    const reader = expectOk(await openArtifactReader(filePath), 'reading plain');
    expect((await readAll(reader)).toString('utf8')).toBe('plain\ncontent\n');
  });

  it('round-trips gzip artifacts and stores them compressed', async () => {
    const filePath = path.join(dir.root, 'data.gz');
    const content = 'compressed line\n'.repeat(200);
    await writeArtifact(filePath, content);

    const onDisk = await fs.readFile(filePath);
    expect(onDisk[0]).toBe(0x1f);
    expect(onDisk[1]).toBe(0x8b);
    expect(onDisk.length).toBeLessThan(content.length);

    const reader = expectOk(await openArtifactReader(filePath), 'reading gzip');
    expect((await readAll(reader)).toString('utf8')).toBe(content);
  });

  it('round-trips an empty gzip artifact', async () => {
    const filePath = path.join(dir.root, 'empty.gz');
    await writeArtifact(filePath, '');

    const reader = expectOk(await openArtifactReader(filePath), 'reading empty gzip');
    expect((await readAll(reader)).length).toBe(0);
  });

  it('fails to open a missing file instead of yielding an empty stream', async () => {
    const filePath = path.join(dir.root, 'missing.txt');

    const error = expectErr(await openArtifactReader(filePath), 'missing file');
    expect(error).toEqual({ code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` });
  });

  it('opens golden and staged readers as a pair', async () => {
    const goldenPath = path.join(dir.root, 'golden.txt');
    const stagedPath = path.join(dir.root, 'staged.txt');
    await writeArtifact(goldenPath, 'g');
    await writeArtifact(stagedPath, 's');

    const pair = expectOk(await openStreamPair(goldenPath, stagedPath), 'pair');
    expect((await readAll(pair.golden)).toString('utf8')).toBe('g');
    expect((await readAll(pair.actual)).toString('utf8')).toBe('s');
  });

  it('reports which side of a pair is missing', async () => {
    const goldenPath = path.join(dir.root, 'golden.txt');
    const stagedPath = path.join(dir.root, 'staged.txt');
    await writeArtifact(goldenPath, 'g');

    const error = expectErr(await openStreamPair(goldenPath, stagedPath), 'missing staged');
    expect(error).toEqual({ code: 'FS_NOT_FOUND', message: `Not found: ${stagedPath}` });
  });
});
