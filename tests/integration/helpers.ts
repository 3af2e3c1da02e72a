import http from 'node:http';
import type { EntityType } from '../../src/types.js';

export interface FeedServerReply {
  status?: number;
  body: string;
}

/** Handler receives the decoded request URL and the service root. */
export type FeedHandler = (url: URL, serviceUrl: string) => FeedServerReply;

export interface FeedServer {
  /** Service root, e.g. `http://127.0.0.1:PORT/svc`. */
  serviceUrl: string;
  /** Request paths (path + query) in arrival order. */
  requests: string[];
  close(): Promise<void>;
}

/**
 * In-process HTTP server standing in for a remote service. Listens on an
 * ephemeral loopback port; nothing leaves the test process.
 */
export async function startFeedServer(handler: FeedHandler): Promise<FeedServer> {
  const requests: string[] = [];
  let serviceUrl = '';

  const server = http.createServer((req, res) => {
    const path = req.url ?? '/';
    requests.push(path);
    const reply = handler(new URL(path, 'http://127.0.0.1'), serviceUrl);
    res.writeHead(reply.status ?? 200, { 'content-type': 'application/atom+xml' });
    res.end(reply.body);
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('feed server is not listening on a TCP port');
  }
  serviceUrl = `http://127.0.0.1:${address.port}/svc`;

  return {
    serviceUrl,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export const productType: EntityType = {
  name: 'Product',
  properties: [
    { name: 'ID', type: 'Edm.Int32' },
    { name: 'Name', type: 'Edm.String' },
  ],
};

export function productFeed(rows: Array<[number, string]>, next?: string): string {
  const entries = rows.map(([id, name]) =>
    [
      '<entry>',
      '  <content type="application/xml">',
      '    <m:properties>',
      `      <d:ID m:type="Edm.Int32">${id}</d:ID>`,
      `      <d:Name>${name}</d:Name>`,
      '    </m:properties>',
      '  </content>',
      '</entry>',
    ].join('\n'),
  );
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom"',
    '  xmlns:d="http://schemas.microsoft.com/ado/2007/08/dataservices"',
    '  xmlns:m="http://schemas.microsoft.com/ado/2007/08/dataservices/metadata">',
    ...entries,
    ...(next !== undefined ? [`  <link rel="next" href="${next}" />`] : []),
    '</feed>',
  ].join('\n');
}
