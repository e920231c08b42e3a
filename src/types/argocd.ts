/**
 * @module types/argocd
 * @description Schemas for Argo CD REST payloads
 * @status COMPLETE
 * @see https://argo-cd.readthedocs.io/en/stable/developer-guide/api-docs/
 * @dependencies zod
 * @lastModified 2026-10-19
 *
 * Every field is optional so that an absent field never fails validation;
 * a present field of the wrong type does. List fields also accept `null`,
 * which the API emits for empty Go slices.
 */

import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Array that tolerates `null` or absence and normalizes both to []
 */
function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);
}

/** int64 fields occasionally arrive as numeric strings */
const Int64Schema = z.union([
  z.number(),
  z.string().regex(/^-?\d+$/).transform(Number),
]);

const StringMapSchema = z.record(z.string()).nullish();

// ============================================================================
// Shared
// ============================================================================

export const ObjectMetaSchema = z.object({
  name: z.string().optional(),
  namespace: z.string().optional(),
  uid: z.string().optional(),
  labels: StringMapSchema,
  annotations: StringMapSchema,
  creationTimestamp: z.string().nullish(),
  resourceVersion: z.string().optional(),
});

export type ObjectMeta = z.infer<typeof ObjectMetaSchema>;

// ============================================================================
// Application
// ============================================================================

export const ApplicationSourceSchema = z.object({
  repoURL: z.string().optional(),
  path: z.string().optional(),
  chart: z.string().optional(),
  targetRevision: z.string().optional(),
  ref: z.string().optional(),
  name: z.string().optional(),
});

export type ApplicationSource = z.infer<typeof ApplicationSourceSchema>;

export const ApplicationDestinationSchema = z.object({
  server: z.string().optional(),
  namespace: z.string().optional(),
  name: z.string().optional(),
});

export const SyncPolicySchema = z.object({
  automated: z
    .object({
      prune: z.boolean().optional(),
      selfHeal: z.boolean().optional(),
      allowEmpty: z.boolean().optional(),
    })
    .nullish(),
  syncOptions: list(z.string()),
});

export const InitiatedBySchema = z.object({
  username: z.string().optional(),
  automated: z.boolean().optional(),
});

export const RevisionHistorySchema = z.object({
  id: Int64Schema.optional(),
  revision: z.string().optional(),
  revisions: list(z.string()),
  deployedAt: z.string().nullish(),
  deployStartedAt: z.string().nullish(),
  source: ApplicationSourceSchema.optional(),
  sources: list(ApplicationSourceSchema),
  initiatedBy: InitiatedBySchema.optional(),
});

export type RevisionHistory = z.infer<typeof RevisionHistorySchema>;

export const ApplicationSpecSchema = z.object({
  project: z.string().optional(),
  source: ApplicationSourceSchema.optional(),
  sources: list(ApplicationSourceSchema),
  destination: ApplicationDestinationSchema.optional(),
  syncPolicy: SyncPolicySchema.nullish(),
});

export const ApplicationStatusSchema = z.object({
  sync: z
    .object({
      status: z.string().optional(),
      revision: z.string().optional(),
      revisions: list(z.string()),
    })
    .optional(),
  health: z
    .object({
      status: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
  history: list(RevisionHistorySchema),
  operationState: z
    .object({
      phase: z.string().optional(),
      message: z.string().optional(),
    })
    .nullish(),
  reconciledAt: z.string().nullish(),
  sourceType: z.string().optional(),
});

export const ApplicationSchema = z.object({
  metadata: ObjectMetaSchema.optional(),
  spec: ApplicationSpecSchema.optional(),
  status: ApplicationStatusSchema.optional(),
});

export type Application = z.infer<typeof ApplicationSchema>;

export const ApplicationListSchema = z.object({
  items: list(ApplicationSchema),
});

export type ApplicationList = z.infer<typeof ApplicationListSchema>;

// ============================================================================
// Resource Tree
// ============================================================================

export const ResourceRefSchema = z.object({
  group: z.string().optional(),
  version: z.string().optional(),
  kind: z.string().optional(),
  namespace: z.string().optional(),
  name: z.string().optional(),
  uid: z.string().optional(),
});

export const ResourceTreeNodeSchema = ResourceRefSchema.extend({
  parentRefs: list(ResourceRefSchema),
  health: z
    .object({
      status: z.string().optional(),
      message: z.string().optional(),
    })
    .nullish(),
  images: list(z.string()),
  info: list(z.object({ name: z.string().optional(), value: z.string().optional() })),
  resourceVersion: z.string().optional(),
  createdAt: z.string().nullish(),
});

export type ResourceTreeNode = z.infer<typeof ResourceTreeNodeSchema>;

export const ApplicationTreeSchema = z.object({
  nodes: list(ResourceTreeNodeSchema),
  orphanedNodes: list(ResourceTreeNodeSchema),
  hosts: list(z.object({ name: z.string().optional() })),
});

export type ApplicationTree = z.infer<typeof ApplicationTreeSchema>;

// ============================================================================
// Events
// ============================================================================

export const KubeEventSchema = z.object({
  metadata: ObjectMetaSchema.optional(),
  type: z.string().optional(),
  reason: z.string().optional(),
  message: z.string().optional(),
  count: z.number().nullish(),
  firstTimestamp: z.string().nullish(),
  lastTimestamp: z.string().nullish(),
  eventTime: z.string().nullish(),
  involvedObject: z
    .object({
      kind: z.string().optional(),
      name: z.string().optional(),
      namespace: z.string().optional(),
      uid: z.string().optional(),
    })
    .optional(),
  source: z
    .object({
      component: z.string().optional(),
      host: z.string().optional(),
    })
    .optional(),
});

export type KubeEvent = z.infer<typeof KubeEventSchema>;

export const EventListSchema = z.object({
  items: list(KubeEventSchema),
});

// ============================================================================
// Server-Side Diff
// ============================================================================

export const ResourceDiffSchema = z.object({
  group: z.string().optional(),
  kind: z.string().optional(),
  namespace: z.string().optional(),
  name: z.string().optional(),
  modified: z.boolean().optional(),
  liveState: z.string().optional(),
  targetState: z.string().optional(),
  normalizedLiveState: z.string().optional(),
  predictedLiveState: z.string().optional(),
});

export type ResourceDiffRecord = z.infer<typeof ResourceDiffSchema>;

export const ServerSideDiffResponseSchema = z.object({
  items: list(ResourceDiffSchema),
  modified: z.boolean().optional(),
});

export type ServerSideDiffResponse = z.infer<typeof ServerSideDiffResponseSchema>;

// ============================================================================
// Logs
// ============================================================================

export const LogEntrySchema = z.object({
  content: z.string().optional(),
  timeStamp: z.string().nullish(),
  timeStampStr: z.string().optional(),
  podName: z.string().optional(),
  last: z.boolean().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/** Error frame the gateway writes into a stream when the call fails midway */
export const StreamErrorSchema = z.object({
  error: z.object({
    http_code: z.number().optional(),
    message: z.string().optional(),
  }),
});

// ============================================================================
// Manifests, Revisions, Sync Windows, Resources
// ============================================================================

export const ManifestResponseSchema = z.object({
  manifests: list(z.string()),
  namespace: z.string().optional(),
  server: z.string().optional(),
  revision: z.string().optional(),
  sourceType: z.string().optional(),
  commands: list(z.string()),
  verifyResult: z.string().optional(),
});

export type ManifestResponse = z.infer<typeof ManifestResponseSchema>;

export const RevisionMetadataSchema = z.object({
  author: z.string().optional(),
  date: z.string().nullish(),
  message: z.string().optional(),
  tags: list(z.string()),
  signatureInfo: z.string().optional(),
});

export type RevisionMetadata = z.infer<typeof RevisionMetadataSchema>;

export const SyncWindowSchema = z.object({
  kind: z.string().optional(),
  schedule: z.string().optional(),
  duration: z.string().optional(),
  applications: list(z.string()),
  namespaces: list(z.string()),
  clusters: list(z.string()),
  manualSync: z.boolean().optional(),
  timeZone: z.string().optional(),
});

export type SyncWindow = z.infer<typeof SyncWindowSchema>;

export const SyncWindowsResponseSchema = z.object({
  activeWindows: list(SyncWindowSchema),
  assignedWindows: list(SyncWindowSchema),
  canSync: z.boolean().optional(),
});

export type SyncWindowsResponse = z.infer<typeof SyncWindowsResponseSchema>;

export const ResourceResponseSchema = z.object({
  manifest: z.string().optional(),
});

export type ResourceResponse = z.infer<typeof ResourceResponseSchema>;
