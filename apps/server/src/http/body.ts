import type { IncomingMessage } from 'node:http';

export const MAX_BODY_SIZE = 1_024 * 1_024; // 1MB

export type BodyResult =
  | { readonly type: 'ok'; readonly value: unknown }
  | { readonly type: 'too-large' }
  | { readonly type: 'invalid-json'; readonly message: string };

/** Read and parse a JSON request body, refusing anything over MAX_BODY_SIZE */
export function readJsonBody(req: IncomingMessage, limit = MAX_BODY_SIZE): Promise<BodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (tooLarge) {
        resolve({ type: 'too-large' });
        return;
      }
      const text = Buffer.concat(chunks).toString('utf8');
      try {
        const value: unknown = JSON.parse(text);
        resolve({ type: 'ok', value });
      } catch (err: unknown) {
        resolve({ type: 'invalid-json', message: err instanceof Error ? err.message : String(err) });
      }
    });

    req.on('error', reject);
  });
}
