/**
 * @module mcp/tools/schemas
 * @description Argument schemas for every MCP tool
 * @status COMPLETE
 * @dependencies zod
 * @lastModified 2026-10-19
 */

import { z } from 'zod';

// ============================================================================
// Shared Fields
// ============================================================================

const applicationName = z.string().min(1).describe('Name of the Argo CD application');
const appNamespace = z.string().optional().describe('Namespace the Application object lives in (apps-in-any-namespace)');
const project = z.string().optional().describe('Project the application belongs to');
const full = z
  .boolean()
  .optional()
  .describe('Return the validated upstream payload instead of the summary (large; for diagnostics)');

// ============================================================================
// Read Tools
// ============================================================================

export const ListApplicationsArgsSchema = z.object({
  name: z.string().optional().describe('Only the application with this name'),
  projects: z.array(z.string()).optional().describe('Only applications in these projects'),
  selector: z.string().optional().describe('Label selector, e.g. "team=payments"'),
  repo: z.string().optional().describe('Only applications sourced from this repository URL'),
  appNamespace,
});
export type ListApplicationsArgs = z.infer<typeof ListApplicationsArgsSchema>;

export const ListApplicationNamesArgsSchema = ListApplicationsArgsSchema.pick({
  projects: true,
  selector: true,
  repo: true,
  appNamespace: true,
});
export type ListApplicationNamesArgs = z.infer<typeof ListApplicationNamesArgsSchema>;

export const GetApplicationArgsSchema = z.object({
  applicationName,
  appNamespace,
  project,
  refresh: z.enum(['normal', 'hard']).optional().describe('Force a refresh before answering'),
  resourceVersion: z.string().optional(),
  full,
});
export type GetApplicationArgs = z.infer<typeof GetApplicationArgsSchema>;

export const ServerSideDiffArgsSchema = z.object({
  applicationName,
  appNamespace,
  project,
  targetManifests: z.array(z.string()).optional().describe('Manifests to diff against instead of the target state'),
  full,
});
export type ServerSideDiffArgs = z.infer<typeof ServerSideDiffArgsSchema>;

export const ResourceTreeArgsSchema = z.object({
  applicationName,
  namespace: z.string().optional().describe('Only resources in this namespace'),
  resourceName: z.string().optional().describe('Only resources with this name'),
  version: z.string().optional(),
  group: z.string().optional(),
  kind: z.string().optional().describe('Only resources of this kind'),
  appNamespace,
  project,
  full,
});
export type ResourceTreeArgs = z.infer<typeof ResourceTreeArgsSchema>;

export const ResourceEventsArgsSchema = z.object({
  applicationName,
  resourceNamespace: z.string().optional(),
  resourceName: z.string().optional(),
  resourceUID: z.string().optional(),
  appNamespace,
  project,
  full,
});
export type ResourceEventsArgs = z.infer<typeof ResourceEventsArgsSchema>;

export const PodLogsArgsSchema = z.object({
  applicationName,
  namespace: z.string().optional(),
  podName: z.string().optional(),
  container: z.string().optional(),
  sinceSeconds: z.number().int().positive().optional(),
  tailLines: z.number().int().positive().optional().describe('Lines to fetch (default 100)'),
  previous: z.boolean().optional().describe('Logs of the previous container instance'),
  filter: z.string().optional().describe('Server-side substring filter'),
  kind: z.string().optional(),
  group: z.string().optional(),
  resourceName: z.string().optional(),
  errorsOnly: z.boolean().optional().describe('List only errors, warnings and potential issues'),
  appNamespace,
  project,
});
export type PodLogsArgs = z.infer<typeof PodLogsArgsSchema>;

export const ManifestsArgsSchema = z.object({
  applicationName,
  revision: z.string().optional(),
  sourcePositions: z.array(z.number().int()).optional(),
  revisions: z.array(z.string()).optional(),
  appNamespace,
  project,
});
export type ManifestsArgs = z.infer<typeof ManifestsArgsSchema>;

export const RevisionMetadataArgsSchema = z.object({
  applicationName,
  revision: z.string().min(1).describe('Commit SHA or tag'),
  sourceIndex: z.number().int().optional(),
  versionId: z.number().int().optional(),
  appNamespace,
  project,
});
export type RevisionMetadataArgs = z.infer<typeof RevisionMetadataArgsSchema>;

export const HistoryArgsSchema = z.object({
  applicationName,
  appNamespace,
  project,
  full,
});
export type HistoryArgs = z.infer<typeof HistoryArgsSchema>;

export const SyncWindowsArgsSchema = z.object({
  applicationName,
  appNamespace,
  project,
});
export type SyncWindowsArgs = z.infer<typeof SyncWindowsArgsSchema>;

export const ResourceArgsSchema = z.object({
  applicationName,
  resourceName: z.string().min(1),
  kind: z.string().min(1),
  version: z.string().min(1),
  namespace: z.string().optional(),
  group: z.string().optional().describe('API group; omit for core resources'),
  appNamespace,
  project,
});
export type ResourceArgs = z.infer<typeof ResourceArgsSchema>;

export const RefreshArgsSchema = z.object({
  applicationName,
  refreshType: z.enum(['normal', 'hard']).optional().describe('hard also invalidates cached manifests (default normal)'),
  appNamespace,
  project,
});
export type RefreshArgs = z.infer<typeof RefreshArgsSchema>;

// ============================================================================
// Write Tools
// ============================================================================

export const SyncArgsSchema = z.object({
  applicationName,
  revision: z.string().optional(),
  dryRun: z.boolean().optional(),
  prune: z.boolean().optional(),
  force: z.boolean().optional(),
  strategy: z.enum(['apply', 'hook']).optional(),
  resources: z
    .array(
      z.object({
        group: z.string().optional(),
        kind: z.string(),
        name: z.string(),
        namespace: z.string().optional(),
      })
    )
    .optional()
    .describe('Sync only these resources'),
  syncOptions: z.array(z.string()).optional().describe('e.g. ["CreateNamespace=true"]'),
  retry: z
    .object({
      limit: z.number().int().optional(),
      backoff: z
        .object({
          duration: z.string().optional(),
          maxDuration: z.string().optional(),
          factor: z.number().int().optional(),
        })
        .optional(),
    })
    .optional(),
  appNamespace,
  project,
});
export type SyncArgs = z.infer<typeof SyncArgsSchema>;

export const RollbackArgsSchema = z.object({
  applicationName,
  id: z.number().int().describe('History id to roll back to'),
  dryRun: z.boolean().optional(),
  prune: z.boolean().optional(),
  appNamespace,
  project,
});
export type RollbackArgs = z.infer<typeof RollbackArgsSchema>;

export const PatchResourceArgsSchema = ResourceArgsSchema.extend({
  patch: z.string().min(1).describe('Patch document as a JSON string'),
  patchType: z
    .string()
    .optional()
    .describe('application/merge-patch+json (default), application/json-patch+json or application/strategic-merge-patch+json'),
});
export type PatchResourceArgs = z.infer<typeof PatchResourceArgsSchema>;
