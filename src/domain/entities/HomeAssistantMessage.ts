import { z } from 'zod';

/**
 * Loose shape of any inbound WebSocket message.
 * Only the fields the handshake and `get_config` exchange look at are typed;
 * everything else is kept so it can be reported verbatim.
 */
export const HAIncomingMessageSchema = z
  .object({
    type: z.string().optional(),
    id: z.unknown().optional(),
    success: z.unknown().optional(),
    result: z.unknown().optional(),
    ha_version: z.unknown().optional(),
  })
  .passthrough();

export type HAIncomingMessage = z.infer<typeof HAIncomingMessageSchema>;

/**
 * Authentication command
 */
export interface HAAuthCommand {
  type: 'auth';
  access_token: string;
}

/**
 * Configuration query, answered with a `result` message carrying the same id
 */
export interface HAGetConfigCommand {
  id: string;
  type: 'get_config';
}

/**
 * Union type for all outgoing commands
 */
export type HAOutgoingCommand = HAAuthCommand | HAGetConfigCommand;

/**
 * Home Assistant config as returned by `get_config`
 */
export type HAConfig = Record<string, unknown>;
