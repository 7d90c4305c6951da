import { z } from 'zod';

/**
 * One service domain as listed by `GET /api/services`
 */
export const ServiceDomainSchema = z
  .object({
    domain: z.string(),
    services: z.record(z.unknown()),
  })
  .passthrough();

export type ServiceDomain = z.infer<typeof ServiceDomainSchema>;
