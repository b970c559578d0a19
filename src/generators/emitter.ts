import * as fs from 'fs';
import * as path from 'path';
import {
  RenderedArtifact, EmitMode, EmitResult, ManifestEntry, PreviewTree, PreviewGroup,
} from '../types';
import { IOFailureError, errorMessage } from '../shared/errors';

/** The only filesystem calls emission makes. */
export interface EmitterFileSystem {
  mkdir(dirPath: string): void;
  writeFile(filePath: string, content: string): void;
}

export const nodeFileSystem: EmitterFileSystem = {
  mkdir: dirPath => {
    fs.mkdirSync(dirPath, { recursive: true });
  },
  writeFile: (filePath, content) => {
    fs.writeFileSync(filePath, content, 'utf-8');
  },
};

export interface EmitOptions {
  mode: EmitMode;
  outputRoot: string;
  entityName: string;
  fs?: EmitterFileSystem;
}

/**
 * Writes artifacts in order (materialize) or only describes them (preview).
 * Both modes return the same tree and manifest shape.
 *
 * On the first I/O error the remaining artifacts are skipped and an
 * IOFailureError carrying the manifest is thrown. Nothing is rolled back.
 */
export function emitArtifacts(artifacts: RenderedArtifact[], options: EmitOptions): EmitResult {
  const tree = buildPreviewTree(artifacts, options.outputRoot, options.entityName);
  const manifest: ManifestEntry[] = artifacts.map(a => ({
    category: a.category,
    relativePath: a.path,
    logicalName: a.logicalName,
    writeStatus: options.mode === 'preview' ? 'planned' : 'not-attempted',
  }));

  if (options.mode === 'preview') {
    return { mode: options.mode, manifest, tree };
  }

  const fileSystem = options.fs ?? nodeFileSystem;
  const createdDirs = new Set<string>();

  artifacts.forEach((artifact, i) => {
    const target = path.join(options.outputRoot, artifact.path);
    try {
      const dir = path.dirname(target);
      if (!createdDirs.has(dir)) {
        fileSystem.mkdir(dir);
        createdDirs.add(dir);
      }
      fileSystem.writeFile(target, artifact.content);
      manifest[i].writeStatus = 'written';
    } catch (error: unknown) {
      const message = errorMessage(error);
      manifest[i].writeStatus = 'failed';
      manifest[i].error = message;
      throw new IOFailureError(artifact.path, message, manifest);
    }
  });

  return { mode: options.mode, manifest, tree };
}

/** Groups artifacts by category, in order of first appearance. */
export function buildPreviewTree(artifacts: RenderedArtifact[], outputRoot: string, entityName: string): PreviewTree {
  const groups: PreviewGroup[] = [];
  const byCategory = new Map<string, PreviewGroup>();

  for (const artifact of artifacts) {
    let group = byCategory.get(artifact.category);
    if (!group) {
      group = { category: artifact.category, artifacts: [] };
      byCategory.set(artifact.category, group);
      groups.push(group);
    }
    group.artifacts.push({
      relativePath: artifact.path,
      logicalName: artifact.logicalName,
      bytes: Buffer.byteLength(artifact.content, 'utf-8'),
    });
  }

  return { entityName, outputRoot, groups };
}
