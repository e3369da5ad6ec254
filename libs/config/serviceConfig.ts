import fs from 'node:fs';
import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';
import { logger } from '../logging/logger.js';
import { ServiceTable } from '../services/ServiceRegistry.js';

export const ServiceAddressSchema = z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535)
}).strict();

export const ServiceConfigSchema = z.object({
    services: z.record(
        z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'service names are identifiers'),
        z.array(ServiceAddressSchema).min(1, 'a configured service needs at least one shard')
    )
}).strict();

export function parseServiceConfig(raw: unknown, source = 'service config'): ServiceTable {
    return validate(ServiceConfigSchema, raw, source).services;
}

/**
 * Reads the service address file once at startup.
 */
export function loadServiceConfig(filePath: string): ServiceTable {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        logger.error({ error, filePath }, 'Cannot read service address file');
        throw new Error(`Cannot read service address file ${filePath}`, { cause: error });
    }

    const services = parseServiceConfig(raw, filePath);
    logger.info({ filePath, services: Object.keys(services) }, 'Service addresses loaded');
    return services;
}
