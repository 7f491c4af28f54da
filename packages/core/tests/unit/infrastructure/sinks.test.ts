import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PassThrough, Writable } from 'node:stream';
import { BufferSink } from '../../../src/infrastructure/sinks/BufferSink.js';
import { FilePathSink } from '../../../src/infrastructure/sinks/FilePathSink.js';
import { StreamSink } from '../../../src/infrastructure/sinks/StreamSink.js';

const TEST_DIR = join(tmpdir(), 'geobatch-test-sinks');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('BufferSink', () => {
  it('should collect written text', async () => {
    const sink = new BufferSink();
    await sink.write('a,b\n');
    await sink.write('1,2\n');
    expect(sink.toString()).toBe('a,b\n1,2\n');
  });

  it('should reject writes after close', async () => {
    const sink = new BufferSink();
    await sink.close();
    expect(sink.isClosed).toBe(true);
    await expect(sink.write('late')).rejects.toThrow('BufferSink: cannot write after close()');
  });
});

describe('FilePathSink', () => {
  it('should truncate and write the file', async () => {
    const filePath = join(TEST_DIR, 'out.csv');
    writeFileSync(filePath, 'stale content\n');

    const sink = new FilePathSink(filePath);
    await sink.write('a,b\n');
    await sink.write('1,2\n');
    await sink.close();

    expect(readFileSync(filePath, 'utf-8')).toBe('a,b\n1,2\n');
  });

  it('should append when asked to', async () => {
    const filePath = join(TEST_DIR, 'append.csv');
    writeFileSync(filePath, 'first\n');

    const sink = new FilePathSink(filePath, { append: true });
    await sink.write('second\n');
    await sink.close();

    expect(readFileSync(filePath, 'utf-8')).toBe('first\nsecond\n');
  });

  it('should create an empty file when nothing was written', async () => {
    const filePath = join(TEST_DIR, 'empty.csv');
    await new FilePathSink(filePath).close();
    expect(existsSync(filePath)).toBe(true);
    expect(readFileSync(filePath, 'utf-8')).toBe('');
  });
});

describe('StreamSink', () => {
  function collect(stream: PassThrough): Promise<string> {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
    });
  }

  it('should write to the stream and end it on close', async () => {
    const stream = new PassThrough();
    const output = collect(stream);

    const sink = new StreamSink(stream);
    await sink.write('a\n');
    await sink.write('b\n');
    await sink.close();

    expect(await output).toBe('a\nb\n');
    expect(stream.writableEnded).toBe(true);
  });

  it('should leave the stream open when end is false', async () => {
    const stream = new PassThrough();
    const sink = new StreamSink(stream, { end: false });
    await sink.write('x');
    await sink.close();
    expect(stream.writableEnded).toBe(false);
  });

  it('should reject every write and close after the stream fails', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      },
    });
    const sink = new StreamSink(stream);

    await expect(sink.write('a\n')).rejects.toThrow('disk full');
    await expect(sink.write('b\n')).rejects.toThrow('disk full');
    await expect(sink.close()).rejects.toThrow('disk full');
  });

  it('should reject close when ending the stream fails', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
      final(callback) {
        callback(new Error('flush failed'));
      },
    });
    const sink = new StreamSink(stream);

    await sink.write('a\n');
    await expect(sink.close()).rejects.toThrow('flush failed');
  });
});

