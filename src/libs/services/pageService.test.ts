import { describe, it, expect, vi, afterEach } from 'vitest';
import { PutObjectCommand } from '@aws-sdk/client-s3';
import { PageService } from './pageService';
import { PersistenceError, classifyError } from '../errors';

const result = {
  content: '<h1>Hello</h1>',
  metaDescription: 'Everything about saying hello.',
  categoryName: 'Interesting Facts'
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('PageService', () => {
  it('writes the rendered page under a key derived from the pair', async () => {
    const send = vi.fn(async (_command: PutObjectCommand) => ({}));
    const service = new PageService({ send }, 'test-bucket');

    const key = await service.savePage('Hello, World!', 'facts', result);

    expect(key).toBe('output/hello-world-facts.html');
    expect(send).toHaveBeenCalledTimes(1);

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command.input).toMatchObject({
      Bucket: 'test-bucket',
      Key: 'output/hello-world-facts.html',
      ContentType: 'text/html',
      CacheControl: 'public, max-age=86400'
    });

    const body = String(command.input.Body);
    expect(body).toContain('<title>Hello, World! - Interesting Facts</title>');
    expect(body).toContain('<h1>Hello</h1>');
    expect(body).toContain('content="Everything about saying hello."');
  });

  it('sends the page as UTF-8 bytes', async () => {
    const send = vi.fn(async (_command: PutObjectCommand) => ({}));
    const service = new PageService({ send }, 'test-bucket');

    await service.savePage('Café', 'facts', result);

    const body = send.mock.calls[0][0].input.Body;
    expect(Buffer.isBuffer(body)).toBe(true);
    expect(String(body)).toContain('<title>Café - Interesting Facts</title>');
  });

  it('wraps storage failures in a PersistenceError', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const denied = new Error('Access Denied');
    const service = new PageService({ send: async () => { throw denied; } }, 'test-bucket');

    const error = await service.savePage('Hello', 'facts', result).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof Error && error.message).toBe('Access Denied');
    expect(classifyError(error)).toBe('PERSISTENCE_ERROR');
  });
});
