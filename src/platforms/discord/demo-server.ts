import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { z } from 'zod';

import { logger } from '../../middleware/logger.js';
import { dispatchInbound, type RelayServices } from '../../core/relay-services.js';

import type { DiscordDemoAdapter, DiscordDemoOutboxEntry } from './adapter.js';
import { normalizeDiscordDemoInbound, parseDiscordDemoMessage } from './processor.js';

const DemoChannelSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  guildId: z.string().min(1),
  guildName: z.string().min(1),
  permissions: z
    .array(z.enum(['view', 'send', 'embed', 'attach', 'read_history', 'add_reactions', 'manage_messages']))
    .default(['view', 'send', 'embed', 'attach', 'read_history', 'add_reactions', 'manage_messages']),
});

const DemoReactionSchema = z.object({
  messageId: z.string().min(1),
  userId: z.string().min(1),
  emoji: z.string().min(1),
});

export interface DiscordDemoServerParams {
  host: string;
  port: number;
  services: RelayServices;
  messenger: DiscordDemoAdapter;
  /** The outbox `messenger` appends to. */
  outbox: DiscordDemoOutboxEntry[];
}

/**
 * Local HTTP front end for the in-memory messenger.
 *
 *   POST /discord/demo            run one message through the relay
 *   POST /discord/demo/channels   register a channel the bot can see
 *   POST /discord/demo/reactions  react to a prompt (confirmations)
 */
export function createDiscordDemoServer(params: DiscordDemoServerParams): ReturnType<typeof createServer> {
  const { services, messenger, outbox } = params;

  const server = createServer(async (req, res) => {
    try {
      if (!req.url || !req.method) {
        writeJson(res, 400, { ok: false, error: 'Missing request URL/method' });
        return;
      }

      if (req.method === 'GET' && (req.url === '/' || req.url === '/discord/demo')) {
        writeJson(res, 200, {
          ok: true,
          message: 'Discord demo server is running',
          postTo: '/discord/demo',
          example: {
            curl: "curl -s -X POST http://127.0.0.1:" + params.port + "/discord/demo \\\n  -H 'content-type: application/json' \\\n  -d '{\"channelId\":\"200000000000000001\",\"serverId\":\"300000000000000001\",\"authorId\":\"400000000000000001\",\"text\":\"!help\"}' | jq",
          },
        });
        return;
      }

      if (req.method !== 'POST') {
        writeJson(res, 404, { ok: false, error: 'Not found' });
        return;
      }

      if (req.url === '/discord/demo/channels') {
        const channel = DemoChannelSchema.parse(await readJsonBody(req, 16_000));
        messenger.addChannel(channel);
        writeJson(res, 200, { ok: true, channel });
        return;
      }

      if (req.url === '/discord/demo/reactions') {
        const signal = DemoReactionSchema.parse(await readJsonBody(req, 16_000));
        messenger.emitReaction(signal);
        writeJson(res, 200, { ok: true, reaction: signal });
        return;
      }

      if (req.url !== '/discord/demo') {
        writeJson(res, 404, { ok: false, error: 'Not found' });
        return;
      }

      const body = await readJsonBody(req, 256_000);
      const inbound = normalizeDiscordDemoInbound(parseDiscordDemoMessage(body));

      const start = outbox.length;
      const result = await dispatchInbound(services, inbound);

      writeJson(res, 200, {
        ok: true,
        inbound: {
          messageId: inbound.messageId,
          channelId: inbound.channelId,
          serverId: inbound.serverId,
          authorId: inbound.authorId,
        },
        outcome: result.outcome,
        ...(result.command ? { command: result.command } : {}),
        outbox: outbox.slice(start),
      });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      const status = err instanceof z.ZodError || err instanceof RequestBodyError ? 400 : 500;
      logger.error({ err, platform: 'discord', path: req.url }, 'Discord demo request failed');
      writeJson(res, status, { ok: false, error });
    }
  });

  server.listen(params.port, params.host, () => {
    logger.info({ host: params.host, port: params.port }, 'Discord demo server listening');
  });

  return server;
}

class RequestBodyError extends Error {}

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > maxBytes) {
      throw new RequestBodyError(`Request body too large (max ${maxBytes} bytes)`);
    }
    chunks.push(buf);
  }

  const raw = Buffer.concat(chunks).toString('utf-8').trim();
  if (!raw) return {};

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new RequestBodyError('Invalid JSON body', { cause: err });
  }
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body, null, 2);
  res.statusCode = status;
  res.setHeader('content-type', 'application/json; charset=utf-8');
  res.end(json);
}
