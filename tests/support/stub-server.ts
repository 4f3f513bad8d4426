import express from 'express';

/**
 * An Express app listening on an ephemeral local port, standing in for a third-party API.
 */
export interface StubServer {
  baseUrl: string;
  close(): Promise<void>;
}

export function startStub(app: express.Application): Promise<StubServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1');
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Stub server has no TCP address'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          })
      });
    });
  });
}

/**
 * Base URL of a port that was just released, for exercising connection failures.
 */
export async function unreachableBaseUrl(): Promise<string> {
  const stub = await startStub(express());
  await stub.close();
  return stub.baseUrl;
}
