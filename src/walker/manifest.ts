import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { type ProjectConfig } from '../types';
import { fromZodError, ValidationError } from '../utils/validators';

/** One project of an umbrella tree, as described in a walk manifest. */
export interface ProjectManifest {
  name: string | null;
  app?: string;
  file: string;
  config: ProjectConfig;
  /** Extra files that contributed configuration besides `file`. */
  configFiles: string[];
  children: ProjectManifest[];
}

const ProjectManifestSchema: z.ZodType<ProjectManifest, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().min(1).nullable().default(null),
    app: z.string().min(1).optional(),
    file: z.string().min(1),
    config: z.record(z.unknown()).default({}),
    configFiles: z.array(z.string().min(1)).default([]),
    children: z.array(ProjectManifestSchema).default([]),
  }),
);

/**
 * Checks the manifest's shape only. A project reusing an ancestor's name is
 * accepted here and reported as a conflict when the walk tries to push it.
 */
export function parseManifest(data: unknown, source: string = 'manifest'): ProjectManifest {
  const result = ProjectManifestSchema.safeParse(data);
  if (!result.success) {
    throw fromZodError(result.error, source)[0];
  }
  return result.data;
}

/** Loads a YAML or JSON manifest, resolving project files against its directory. */
export function loadManifest(filePath: string): ProjectManifest {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Manifest not found: ${filePath}`, 'manifest', filePath);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const data: unknown = filePath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  const manifest = parseManifest(data, path.basename(filePath));
  return resolvePaths(manifest, path.dirname(path.resolve(filePath)));
}

function resolvePaths(project: ProjectManifest, baseDir: string): ProjectManifest {
  return {
    ...project,
    file: path.resolve(baseDir, project.file),
    configFiles: project.configFiles.map((file) => path.resolve(baseDir, file)),
    children: project.children.map((child) => resolvePaths(child, baseDir)),
  };
}
