/**
 * Infracost facade
 *
 * `infracost breakdown --format json` reports costs as decimal strings
 * (or null for free/unpriced resources).
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DataError, ToolExecutionError, formatZodIssues } from '../errors/index.js';
import type { ToolRunner } from '../runner/index.js';
import type { CostSnapshot } from './types.js';

const Money = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value, ctx) => {
    if (value === null || value === undefined || value === '') return 0;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(value)}` });
      return z.NEVER;
    }
    return parsed;
  });

const InfracostResourceSchema = z.object({
  name: z.string(),
  monthlyCost: Money,
});

const InfracostOutputSchema = z.object({
  currency: z.string().default('USD'),
  totalMonthlyCost: Money,
  projects: z
    .array(
      z.object({
        name: z.string().default(''),
        breakdown: z
          .object({ resources: z.array(InfracostResourceSchema).default([]) })
          .nullable()
          .optional(),
      })
    )
    .default([]),
});

/**
 * Convert infracost JSON into a snapshot. With several projects, addresses
 * are prefixed by project name so they stay unique.
 */
export function parseInfracostJson(raw: unknown): CostSnapshot {
  const parsed = InfracostOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataError(`Malformed infracost output: ${formatZodIssues(parsed.error)}`);
  }

  const { currency, totalMonthlyCost, projects } = parsed.data;
  const prefix = projects.length > 1;
  const resources: Record<string, number> = {};

  for (const project of projects) {
    for (const resource of project.breakdown?.resources ?? []) {
      const address = prefix ? `${project.name}/${resource.name}` : resource.name;
      resources[address] = (resources[address] ?? 0) + resource.monthlyCost;
    }
  }

  const sorted: Record<string, number> = {};
  for (const address of Object.keys(resources).sort()) {
    sorted[address] = resources[address];
  }

  return { currency, totalMonthlyCost, resources: sorted };
}

export interface InfracostCliOptions {
  binary?: string;
  timeoutMs?: number;
  currency?: string;
}

export class InfracostCli {
  private runner: ToolRunner;
  private binary: string;
  private timeoutMs?: number;
  private currency?: string;

  constructor(runner: ToolRunner, options: InfracostCliOptions = {}) {
    this.runner = runner;
    this.binary = options.binary ?? 'infracost';
    this.timeoutMs = options.timeoutMs;
    this.currency = options.currency;
  }

  /**
   * Estimate `path` and write the raw JSON to `outFile`
   *
   * @throws {ToolExecutionError} when infracost fails
   * @throws {DataError} when its output can't be read as a snapshot
   */
  async breakdown(path: string, outFile: string): Promise<CostSnapshot> {
    const result = await this.runner.execute(
      this.binary,
      ['breakdown', `--path=${path}`, '--format=json', `--out-file=${outFile}`, '--no-color'],
      {
        cwd: path,
        tool: 'infracost breakdown',
        timeoutMs: this.timeoutMs,
        env: this.currency ? { ...process.env, INFRACOST_CURRENCY: this.currency } : undefined,
      }
    );

    if (result.outcome !== 'success') {
      throw new ToolExecutionError(result.tool, result.exitCode, result.output);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(outFile, 'utf-8'));
    } catch (error) {
      throw new DataError(`Could not read infracost output ${outFile}`, { cause: error });
    }
    return parseInfracostJson(raw);
  }
}

export function createInfracostCli(runner: ToolRunner, options?: InfracostCliOptions): InfracostCli {
  return new InfracostCli(runner, options);
}
