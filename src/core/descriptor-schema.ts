/**
 * Descriptor schemas with Zod validation.
 *
 * These describe the raw document (compose-style keys, short and long syntax).
 * The loader turns a validated document into the typed `Stack` model.
 */

import {z} from 'zod'

const scalarValue = z.union([z.string(), z.number(), z.boolean(), z.null()])
const stringOrList = z.union([z.string(), z.array(z.string())])
const durationValue = z.union([z.string(), z.number().nonnegative()])
const keyValueList = z.union([z.array(z.string()), z.record(z.string(), scalarValue)])

export const PortSchema = z.union([
  z.string(),
  z.number().int(),
  z.object({
    target: z.number().int(),
    published: z.union([z.string(), z.number().int()]).optional(),
    host_ip: z.string().optional(),
    protocol: z.enum(['tcp', 'udp']).optional()
  }).strict()
])

export const VolumeMountSchema = z.union([
  z.string().min(1),
  z.object({
    type: z.enum(['bind', 'volume']),
    source: z.string().optional(),
    target: z.string(),
    read_only: z.boolean().optional()
  }).strict()
])

export const HealthCheckSchema = z.object({
  test: z.union([z.string(), z.array(z.string()).min(1)]).optional(),
  interval: durationValue.optional(),
  timeout: durationValue.optional(),
  start_period: durationValue.optional(),
  retries: z.number().int().min(1).optional(),
  disable: z.boolean().optional()
}).strict()

export const BuildSchema = z.union([
  z.string().min(1),
  z.object({
    context: z.string().default('.'),
    dockerfile: z.string().optional(),
    args: keyValueList.optional()
  }).strict()
])

export const EnvFileSchema = z.union([
  z.string(),
  z.array(z.union([
    z.string(),
    z.object({
      path: z.string(),
      required: z.boolean().optional()
    }).strict()
  ]))
])

export const DependsOnSchema = z.union([
  z.array(z.string()),
  z.record(z.string(), z.object({
    condition: z.enum(['service_started', 'service_healthy']).optional(),
    required: z.boolean().optional()
  }).strict())
])

export const ServiceNetworksSchema = z.union([
  z.array(z.string()),
  z.record(z.string(), z.object({
    aliases: z.array(z.string()).optional()
  }).strict().nullable())
])

export const ServiceSchema = z.object({
  image: z.string().min(1).optional(),
  build: BuildSchema.optional(),
  container_name: z.string().regex(/^[a-zA-Z\d][\w.-]*$/, 'invalid container name').optional(),
  command: stringOrList.optional(),
  ports: z.array(PortSchema).optional(),
  volumes: z.array(VolumeMountSchema).optional(),
  healthcheck: HealthCheckSchema.optional(),
  restart: z.union([z.string(), z.literal(false)]).optional(),
  env_file: EnvFileSchema.optional(),
  environment: keyValueList.optional(),
  depends_on: DependsOnSchema.optional(),
  networks: ServiceNetworksSchema.optional(),
  stop_grace_period: durationValue.optional()
}).strict().refine(service => service.image !== undefined || service.build !== undefined, {
  message: 'either "image" or "build" is required'
})

const ResourceSchema = z.object({
  driver: z.string().optional(),
  external: z.boolean().optional()
}).strict().nullable()

export const DescriptorSchema = z.object({
  version: z.union([z.string(), z.number()]).optional(),
  name: z.string().optional(),
  services: z.record(z.string(), ServiceSchema).refine(services => Object.keys(services).length > 0, {
    message: 'at least one service is required'
  }),
  networks: z.record(z.string(), ResourceSchema).optional(),
  volumes: z.record(z.string(), ResourceSchema).optional()
}).strict()

export type RawDescriptor = z.infer<typeof DescriptorSchema>
export type RawService = z.infer<typeof ServiceSchema>
