import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { ArtifactStore, ResearchArtifact } from '../../shared/artifacts';

const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of persistence root: ${target}`);
  }
};

export const createFsArtifactStore = (config: Pick<AppConfig, 'persistence'>): ArtifactStore => {
  const rootDir = config.persistence.rootDir;
  const resultsDir = path.join(rootDir, 'results');

  const saveResearchResult = async (runId: string, artifact: ResearchArtifact) => {
    await ensureDir(resultsDir);
    const target = path.join(resultsDir, `${sanitizeSegment(runId)}.json`);
    guardPath(rootDir, target);
    await fs.writeFile(target, JSON.stringify(artifact, null, 2), 'utf-8');
    return target;
  };

  return { saveResearchResult };
};
