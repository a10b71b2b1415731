import { z } from 'zod';
import { getLogger } from '@fluidware-it/saddlebag';
import type {
  ContainerObject,
  NodeObject,
  NodeUsageSample,
  PodObject,
  PodUsageSample,
  QuantityMap,
  WorkloadKind,
  WorkloadObject
} from '../types/k8s';

const logger = getLogger();

// Decoding of raw API objects into the canonical shapes. Typed client models and plain JSON
// (custom objects such as DeploymentConfig) go through the same schemas, so every kind is
// read the same way and only here.

const quantitySchema = z.union([z.string(), z.number()]).transform(value => String(value));

const quantityMapSchema = z
  .record(z.string(), quantitySchema)
  .nullish()
  .transform((map): QuantityMap => map ?? {});

const containerSchema = z
  .object({
    name: z.string().default(''),
    resources: z
      .object({
        requests: quantityMapSchema,
        limits: quantityMapSchema
      })
      .nullish()
  })
  .transform(
    (container): ContainerObject => ({
      name: container.name,
      requests: container.resources?.requests ?? {},
      limits: container.resources?.limits ?? {}
    })
  );

// Only regular containers: init containers run one after another before the main ones and
// never hold resources at the same time, so they are not read at all.
const containersSchema = z
  .array(containerSchema)
  .nullish()
  .transform(containers => containers ?? []);

const metadataSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().nullish(),
  ownerReferences: z
    .array(z.object({ kind: z.string(), name: z.string() }))
    .nullish()
});

const workloadSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      replicas: z.number().nullish(),
      template: z
        .object({
          spec: z.object({ containers: containersSchema }).nullish()
        })
        .nullish()
    })
    .nullish()
});

const podSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      nodeName: z.string().nullish(),
      containers: containersSchema
    })
    .nullish(),
  status: z.object({ phase: z.string().nullish() }).nullish()
});

const nodeSchema = z.object({
  metadata: metadataSchema,
  status: z
    .object({
      capacity: quantityMapSchema,
      allocatable: quantityMapSchema
    })
    .nullish()
});

const usageSchema = z.object({ cpu: quantitySchema, memory: quantitySchema });

const podMetricsSchema = z.object({
  metadata: z.object({ name: z.string().min(1) }),
  containers: z.array(z.object({ usage: usageSchema }))
});

const nodeMetricsSchema = z.object({
  metadata: z.object({ name: z.string().min(1) }),
  usage: usageSchema
});

const listSchema = z.object({ items: z.array(z.unknown()) });

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// Items of a raw list response; a response without an items array decodes to no items
export function listItems(raw: unknown): unknown[] {
  const parsed = listSchema.safeParse(raw);
  return parsed.success ? parsed.data.items : [];
}

export function filterWorkloadData(raw: unknown, kind: WorkloadKind, namespace: string): WorkloadObject | undefined {
  const parsed = workloadSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed ${kind} in ${namespace}: ${describeIssues(parsed.error)}`);
    return undefined;
  }
  const { metadata, spec } = parsed.data;
  return {
    kind,
    name: metadata.name,
    namespace: metadata.namespace ?? namespace,
    replicas: spec?.replicas ?? undefined,
    containers: spec?.template?.spec?.containers ?? []
  };
}

export function filterPodData(raw: unknown): PodObject | undefined {
  const parsed = podSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed pod: ${describeIssues(parsed.error)}`);
    return undefined;
  }
  const { metadata, spec, status } = parsed.data;
  const nodeName = spec?.nodeName;
  return {
    name: metadata.name,
    namespace: metadata.namespace ?? 'default',
    phase: status?.phase ?? 'Unknown',
    ownerReferences: metadata.ownerReferences ?? [],
    containers: spec?.containers ?? [],
    ...(nodeName ? { nodeName } : {})
  };
}

export function filterNodeData(raw: unknown): NodeObject | undefined {
  const parsed = nodeSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed node: ${describeIssues(parsed.error)}`);
    return undefined;
  }
  const { metadata, status } = parsed.data;
  return {
    name: metadata.name,
    capacity: status?.capacity ?? {},
    allocatable: status?.allocatable ?? {}
  };
}

// One sample per container, as the metrics API reports them
export function filterPodMetrics(raw: unknown): PodUsageSample[] {
  const parsed = podMetricsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.debug(`Ignoring malformed pod metrics: ${describeIssues(parsed.error)}`);
    return [];
  }
  const { metadata, containers } = parsed.data;
  return containers.map(container => ({
    podName: metadata.name,
    cpu: container.usage.cpu,
    memory: container.usage.memory
  }));
}

export function filterNodeMetrics(raw: unknown): NodeUsageSample | undefined {
  const parsed = nodeMetricsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.debug(`Ignoring malformed node metrics: ${describeIssues(parsed.error)}`);
    return undefined;
  }
  return { nodeName: parsed.data.metadata.name, cpu: parsed.data.usage.cpu, memory: parsed.data.usage.memory };
}

export function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}
