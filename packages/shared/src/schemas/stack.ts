import { z } from 'zod';
import { JsonValueSchema } from './blueprint.js';

export const PortConfigSchema = z
  .object({
    target: z.number({ invalid_type_error: 'port target must be an integer' }).int(),
    published: z.union([z.number().int(), z.string().min(1)]).optional(),
    protocol: z.enum(['tcp', 'udp']).default('tcp'),
    host_ip: z.string().optional(),
  })
  .passthrough();

export const VolumeMountSchema = z
  .object({
    type: z.enum(['bind', 'volume', 'tmpfs']),
    source: z.string().min(1).optional(),
    target: z.string().min(1),
    read_only: z.boolean().optional(),
    bind: z
      .object({
        propagation: z.string().optional(),
        create_host_path: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()
  .superRefine((volume, ctx) => {
    if (volume.type === 'bind' && !volume.source) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['source'],
        message: 'bind mounts need a source',
      });
    }
  });

export const ServiceNetworkConfigSchema = z
  .object({
    ipv4_address: z.string().optional(),
    aliases: z.array(z.string()).optional(),
  })
  .passthrough();

// Shape order is the key order of the serialized service
export const ComposeServiceSchema = z
  .object({
    image: z.string({ required_error: 'image is required' }).min(1, 'image is required'),
    container_name: z.string().optional(),
    hostname: z.string().optional(),
    restart: z.string().optional(),
    user: z.string().optional(),
    environment: z.array(z.string()).optional(),
    ports: z.array(PortConfigSchema).optional(),
    volumes: z.array(VolumeMountSchema).optional(),
    networks: z.union([z.array(z.string()), z.record(z.string(), ServiceNetworkConfigSchema)]).optional(),
  })
  .passthrough();

const TopLevelSectionSchema = z.record(z.string(), z.record(z.string(), JsonValueSchema));

export const StackDescriptorSchema = z
  .object({
    services: z
      .record(z.string(), ComposeServiceSchema)
      .refine(services => Object.keys(services).length > 0, 'at least one service is required'),
    networks: TopLevelSectionSchema.optional(),
    volumes: TopLevelSectionSchema.optional(),
    secrets: TopLevelSectionSchema.optional(),
    configs: TopLevelSectionSchema.optional(),
  })
  .passthrough();
