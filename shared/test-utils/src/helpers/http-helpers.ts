/**
 * HTTP Test Helpers
 *
 * Real servers on 127.0.0.1 ephemeral ports, and a plain GET client that
 * opens a fresh socket per request so closing a server never waits on a
 * keep-alive connection.
 */

import http from 'http';
import type { AddressInfo } from 'net';

export interface TestServer {
  baseUrl: string;
  port: number;
  server: http.Server;
  close(): Promise<void>;
}

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  text: string;
  /** Parsed JSON body, or undefined when the body is not JSON */
  body: unknown;
}

export async function startTestServer(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });

  const port = portOf(server);
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    port,
    server,
    close: () => closeServer(server),
  };
}

export function httpGet(url: string, headers: Record<string, string> = {}): Promise<TestResponse> {
  return new Promise<TestResponse>((resolve, reject) => {
    const request = http.get(url, { headers, agent: false }, response => {
      const chunks: Buffer[] = [];
      response.on('data', (chunk: Buffer) => chunks.push(chunk));
      response.on('error', reject);
      response.on('end', () => {
        const text = Buffer.concat(chunks).toString('utf8');
        resolve({
          status: response.statusCode ?? 0,
          headers: response.headers,
          text,
          body: parseJson(text),
        });
      });
    });
    request.on('error', reject);
  });
}

/**
 * Base URL of a port nothing listens on. The port was bound and released a
 * moment ago, so connections to it are refused.
 */
export async function closedPortUrl(): Promise<string> {
  const server = http.createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const port = portOf(server);
  await closeServer(server);
  return `http://127.0.0.1:${port}`;
}

function portOf(server: http.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  const info: AddressInfo = address;
  return info.port;
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

function parseJson(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
