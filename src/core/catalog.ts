import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { SetupError, SetupErrorCode, errorMessage } from '../utils/errors.js';

const ChannelSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('copr'), name: z.string().min(1) }),
  z.object({ type: z.literal('repo-file'), url: z.string().url() }),
  z.object({ type: z.literal('tap'), name: z.string().min(1) }),
]);

const SourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('native') }),
  z.object({ kind: z.literal('cask') }),
  z.object({ kind: z.literal('repository-plugin'), channel: ChannelSchema }),
  z.object({ kind: z.literal('try-then-fallback'), channel: ChannelSchema }),
  z.object({
    kind: z.literal('build-from-source'),
    toolchain: z.array(z.string().min(1)),
    build: z.array(z.string().min(1)).min(1),
  }),
]);

const ProfileSchema = z.enum(['desktop', 'server']);
const PolicySchema = z.enum(['abort', 'continue']);

const StepSchema = z.discriminatedUnion('step', [
  z.object({
    step: z.literal('package'),
    name: z.string().min(1),
    command: z.string().min(1).optional(),
    profiles: z.array(ProfileSchema).optional(),
    source: SourceSchema.default({ kind: 'native' }),
    onFailure: PolicySchema.default('abort'),
  }),
  z.object({ step: z.literal('shell'), path: z.string().startsWith('/') }),
  z.object({ step: z.literal('refresh-index') }),
  z.object({ step: z.literal('zinit') }),
  z.object({ step: z.literal('lazyvim') }),
  z.object({ step: z.literal('ezpodman') }),
  z.object({ step: z.literal('note'), message: z.string() }),
]);

const CatalogSchema = z.object({
  macos: z.array(StepSchema),
  fedora: z.array(StepSchema),
  arch: z.array(StepSchema),
});

export type CatalogStep = z.infer<typeof StepSchema>;
export type Catalog = z.infer<typeof CatalogSchema>;

// Resolves from both src/core and dist/core.
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../catalog/packages.json', import.meta.url));

export function parseCatalog(raw: unknown, source = 'catalog'): Catalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SetupError(SetupErrorCode.CATALOG_INVALID, `Invalid package catalog: ${source}`, {
      hints: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export async function loadCatalog(file: string = DEFAULT_CATALOG_PATH): Promise<Catalog> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(file, 'utf8'));
  } catch (err) {
    throw new SetupError(SetupErrorCode.CATALOG_INVALID, `Cannot read package catalog: ${file}`, {
      hints: [errorMessage(err)],
    });
  }
  return parseCatalog(raw, file);
}
