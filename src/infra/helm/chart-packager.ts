/**
 * Chart Packager
 *
 * Downloads a source archive, extracts it, discovers the extraction root by
 * prefix (archive roots carry an unpredictable suffix such as a branch or
 * commit), resolves chart dependencies and packages the chart.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import AdmZip from 'adm-zip';
import type { Logger } from 'pino';
import type { ProcessExecutor } from '@/infra/process/executor';
import { createCommandSpec } from '@/infra/process/executor';
import { ChartNotFoundError, PackageNotProducedError } from '@/lib/errors';
import { createScratchDir, downloadFile, isDirectory } from '@/lib/file-utils';
import { createTimer } from '@/lib/logger';

export interface ChartSource {
  archiveUrl: string;
  /** Extraction roots are matched by this prefix */
  rootPrefix: string;
  /** Chart directory relative to the extraction root, e.g. `charts/supabase` */
  chartPath: string;
  /** Packaged file name prefix, e.g. `supabase-` for `supabase-0.1.3.tgz` */
  packagePrefix: string;
}

export interface PackagedChart {
  packagePath: string;
  chartDir: string;
  workDir: string;
}

export interface ChartPackagerOptions {
  executor: ProcessExecutor;
  logger: Logger;
  helmPath?: string;
  download?: (url: string, dest: string) => Promise<void>;
  extract?: (archivePath: string, dest: string) => Promise<void>;
  /** Scratch directory factory; defaults to a temp dir removed at process exit */
  scratchDir?: () => string;
}

export interface ChartPackager {
  package: (source: ChartSource) => Promise<PackagedChart>;
}

async function extractZip(archivePath: string, dest: string): Promise<void> {
  new AdmZip(archivePath).extractAllTo(dest, true);
}

/**
 * Find `<root>/<chartPath>` where `<root>` is a directory whose name starts
 * with `rootPrefix`. Candidates are checked in name order.
 */
export async function locateChartDirectory(
  extractDir: string,
  rootPrefix: string,
  chartPath: string,
): Promise<string> {
  const entries = await fs.readdir(extractDir, { withFileTypes: true });
  const roots = entries
    .filter((entry) => entry.isDirectory() && entry.name.startsWith(rootPrefix))
    .map((entry) => entry.name)
    .sort();

  for (const root of roots) {
    const candidate = path.join(extractDir, root, chartPath);
    if (await isDirectory(candidate)) {
      return candidate;
    }
  }

  throw new ChartNotFoundError(path.join(extractDir, `${rootPrefix}*`, chartPath));
}

/**
 * Find the packaged archive `<packagePrefix>*.tgz` in `dir`.
 */
export async function findPackagedChart(dir: string, packagePrefix: string): Promise<string> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const matches = entries
    .filter(
      (entry) => entry.isFile() && entry.name.startsWith(packagePrefix) && entry.name.endsWith('.tgz'),
    )
    .map((entry) => entry.name)
    .sort();

  const first = matches[0];
  if (first === undefined) {
    throw new PackageNotProducedError(dir, `${packagePrefix}*.tgz`);
  }
  return path.join(dir, first);
}

export function createChartPackager(options: ChartPackagerOptions): ChartPackager {
  const { executor, logger } = options;
  const helm = options.helmPath ?? 'helm';
  const download = options.download ?? downloadFile;
  const extract = options.extract ?? extractZip;
  const scratchDir = options.scratchDir ?? (() => createScratchDir('chart-'));

  return {
    async package(source) {
      const timer = createTimer(logger, 'package-chart');
      const workDir = scratchDir();
      const archivePath = path.join(workDir, 'src.zip');

      logger.info({ url: source.archiveUrl, workDir }, 'Downloading chart source archive');
      await download(source.archiveUrl, archivePath);
      timer.checkpoint('downloaded');

      await extract(archivePath, workDir);
      const chartDir = await locateChartDirectory(workDir, source.rootPrefix, source.chartPath);
      timer.checkpoint('extracted', { chartDir });

      await executor.run(createCommandSpec([helm, 'dependency', 'build', chartDir]));
      await executor.run(createCommandSpec([helm, 'package', chartDir, '-d', workDir]));

      const packagePath = await findPackagedChart(workDir, source.packagePrefix);
      timer.end({ packagePath });
      return { packagePath, chartDir, workDir };
    },
  };
}
