import type { Server } from 'node:http';
import { once } from 'node:events';
import express from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { badRequest } from '../src/errors.js';
import { createErrorHandler } from '../src/middleware/error-handler.js';
import { asyncHandler } from '../src/utils/async-handler.js';
import { createMemoryLogger } from './helpers/factories.js';

describe('asyncHandler', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const app = express();
    app.get(
      '/sync',
      asyncHandler(() => {
        throw badRequest('thrown before any await');
      })
    );
    app.get(
      '/async',
      asyncHandler(async () => {
        throw badRequest('rejected');
      })
    );
    app.use(createErrorHandler(createMemoryLogger()));

    server = app.listen(0);
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server did not bind a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.close();
    await once(server, 'close');
  });

  it('forwards a synchronous throw to the error middleware', async () => {
    const response = await fetch(`${baseUrl}/sync`);

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ message: 'thrown before any await' });
  });

  it('forwards a rejected promise to the error middleware', async () => {
    const response = await fetch(`${baseUrl}/async`);

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ message: 'rejected' });
  });
});
