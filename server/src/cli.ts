#!/usr/bin/env node
import fs from 'fs';
import { loadConfig } from '../../lib/config';
import { AppError, RequestValidationError, errorMessage } from '../../lib/errors';
import { toCsv, toRows, toTable } from '../../lib/format';
import { createLogger } from '../../lib/logger';
import { parseSelectionRequest, type RawSelectionParams } from '../../lib/params';
import { createRecommendationService } from '../../lib/runtime';
import type { RecommendationService } from '../../lib/service';

export type OutputFormat = 'table' | 'json' | 'csv';

export interface CliOptions {
  params: RawSelectionParams;
  format: OutputFormat;
  out: string | null;
  refresh: boolean;
  help: boolean;
}

export const USAGE = `Usage: fpl-recommend --budget <m> --need <pos:count,...> [options]

  --budget <m>            Money available in millions, e.g. 7.5
  --need <list>           Positions to add, e.g. 2:1,3:2 (1=GK 2=DEF 3=MID 4=FWD)
  --exclude <ids>         Comma separated player ids already in your squad
  --max-from-team <n>     Max players from one club, 1..3 (default 3)
  --top-per-pos <n>       Candidates considered per position (default 30)
  --format <fmt>          table | json | csv (default table)
  --out <file>            Also write the rows as JSON to <file>
  --refresh               Ignore the cache and refetch from the FPL API
  --help                  Show this message`;

const VALUE_FLAGS: Record<string, keyof RawSelectionParams> = {
  '--budget': 'budget',
  '--need': 'need',
  '--exclude': 'exclude',
  '--max-from-team': 'max_from_team',
  '--top-per-pos': 'top_per_pos',
};

/**
 * Parse command line arguments. Accepts both "--flag value" and "--flag=value".
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { params: {}, format: 'table', out: null, refresh: false, help: false };
  const errors: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = arg.startsWith('--') && eq > 0 ? arg.slice(eq + 1) : undefined;

    if (flag === '--help' || flag === '-h') {
      options.help = true;
      continue;
    }
    if (flag === '--refresh') {
      options.refresh = true;
      continue;
    }

    const isValueFlag = Object.hasOwn(VALUE_FLAGS, flag) || flag === '--format' || flag === '--out';
    if (!isValueFlag) {
      errors.push(`unknown argument "${arg}"`);
      continue;
    }

    let value = inline;
    if (value === undefined) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        errors.push(`${flag} needs a value`);
        continue;
      }
      value = next;
      i++;
    }

    if (flag === '--format') {
      if (value === 'table' || value === 'json' || value === 'csv') options.format = value;
      else errors.push(`--format must be table, json or csv`);
    } else if (flag === '--out') {
      options.out = value;
    } else {
      options.params[VALUE_FLAGS[flag]] = value;
    }
  }

  if (errors.length > 0) throw new RequestValidationError(errors);
  return options;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  writeFile: (file: string, contents: string) => void;
}

/**
 * Run one recommendation and print it. Returns the process exit code.
 */
export async function runCli(argv: string[], service: RecommendationService, io: CliIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    io.stderr(`${errorMessage(err)}\n\n${USAGE}\n`);
    return 1;
  }

  if (options.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  try {
    const request = parseSelectionRequest(options.params);
    const { result } = await service.recommend(request, { refresh: options.refresh });

    if (result.kind === 'infeasible') {
      const detail = result.shortfalls
        .map((s) => `${s.position}: ${s.filled}/${s.required}`)
        .join(', ');
      io.stderr(`No feasible roster under the given constraints (${detail}).\n`);
      return 1;
    }

    const rows = result.kind === 'ok' ? toRows(result.players) : [];
    if (result.kind === 'empty') io.stderr('No positions requested.\n');

    if (options.format === 'json') io.stdout(`${JSON.stringify(rows, null, 2)}\n`);
    else if (options.format === 'csv') io.stdout(`${toCsv(rows)}\n`);
    else {
      io.stdout(`${toTable(rows)}\n`);
      if (result.kind === 'ok') {
        io.stdout(`\nTotal cost ${result.totalCost.toFixed(1)}m, ${result.remaining.toFixed(1)}m left\n`);
      }
    }

    if (options.out) {
      io.writeFile(options.out, JSON.stringify(rows, null, 2));
      io.stderr(`Saved JSON to ${options.out}\n`);
    }
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      io.stderr(`${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('cli', { ...config.logging, stderr: true });
  const { service, close } = createRecommendationService(config, logger);

  try {
    process.exitCode = await runCli(process.argv.slice(2), service, {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
      writeFile: (file, contents) => fs.writeFileSync(file, contents),
    });
  } finally {
    await close();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
