/**
 * npm probes for the vulnerability audit, outdated packages and the installed
 * package count. npm exits non-zero whenever it has something to report,
 * so exit codes are ignored in favour of the JSON document on stdout.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { BaseProbe, parseJson } from './base-probe.js';
import type {
  InstalledFindings,
  OutdatedFindings,
  OutdatedPackage,
  ProbeResult,
  VulnerabilityFindings,
} from './types.js';

const AUDIT_TIMEOUT_MS = 120_000;
const OUTDATED_TIMEOUT_MS = 60_000;
const LIST_TIMEOUT_MS = 30_000;
const MAX_VULNERABILITY_DETAILS = 10;

const NpmErrorSchema = z.object({
  error: z.object({
    code: z.string().nullable().optional(),
    summary: z.string(),
  }),
});

const AuditReportSchema = z.object({
  vulnerabilities: z.record(z.string(), z.object({
    name: z.string().optional(),
    severity: z.string(),
    via: z.array(z.union([
      z.string(),
      z.object({ title: z.string().optional() }),
    ])).default([]),
  })).default({}),
  metadata: z.object({
    vulnerabilities: z.record(z.string(), z.number()).optional(),
  }).optional(),
});

const OutdatedEntrySchema = z.object({
  current: z.string().optional(),
  wanted: z.string().optional(),
  latest: z.string().optional(),
});

// Workspaces report an array per package
const OutdatedReportSchema = z.record(
  z.string(),
  z.union([OutdatedEntrySchema, z.array(OutdatedEntrySchema)]),
);

const ListReportSchema = z.object({
  dependencies: z.record(z.string(), z.unknown()).default({}),
});

function npmError(value: unknown): string | null {
  const parsed = NpmErrorSchema.safeParse(value);
  if (!parsed.success) return null;
  return parsed.data.error.summary || parsed.data.error.code || 'npm reported an error';
}

// ═══════════════════════════════════════════════════════════════
// AUDIT
// ═══════════════════════════════════════════════════════════════

export class NpmAuditProbe extends BaseProbe<VulnerabilityFindings> {
  readonly name = 'npm-audit';

  protected empty(): VulnerabilityFindings {
    return { count: 0, bySeverity: {}, details: [] };
  }

  protected async collect(): Promise<ProbeResult<VulnerabilityFindings>> {
    if (!existsSync(join(this.cwd, 'package-lock.json'))) {
      return this.unavailable('not_found', 'No package-lock.json to audit');
    }

    const version = await this.detectVersion('npm', ['--version']);
    if (!version.ok) return version.result;

    const outcome = await this.exec('npm', ['audit', '--json'], AUDIT_TIMEOUT_MS);
    if (outcome.kind === 'failed') {
      return this.unavailable(outcome.error, outcome.message);
    }

    const raw = parseJson(outcome.stdout);
    const reported = npmError(raw);
    if (reported) {
      return this.unavailable('other', reported);
    }

    const parsed = AuditReportSchema.safeParse(raw);
    if (!parsed.success) {
      return this.unavailable('parse_error', 'npm audit output could not be parsed');
    }

    const entries = Object.entries(parsed.data.vulnerabilities);
    const bySeverity: Record<string, number> = {};
    for (const [, vuln] of entries) {
      bySeverity[vuln.severity] = (bySeverity[vuln.severity] ?? 0) + 1;
    }

    const details = entries.slice(0, MAX_VULNERABILITY_DETAILS).map(([key, vuln]) => {
      const advisory = vuln.via.find(v => typeof v !== 'string');
      const title = typeof advisory === 'object' && advisory.title
        ? advisory.title
        : vuln.via.filter(v => typeof v === 'string').join(', ') || 'unknown';
      return `${vuln.name ?? key} (${vuln.severity}): ${title}`;
    });

    return {
      available: true,
      version: version.version,
      findings: { count: entries.length, bySeverity, details },
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// OUTDATED
// ═══════════════════════════════════════════════════════════════

export class NpmOutdatedProbe extends BaseProbe<OutdatedFindings> {
  readonly name = 'npm-outdated';

  protected empty(): OutdatedFindings {
    return { packages: [] };
  }

  protected async collect(): Promise<ProbeResult<OutdatedFindings>> {
    const version = await this.detectVersion('npm', ['--version']);
    if (!version.ok) return version.result;

    const outcome = await this.exec('npm', ['outdated', '--json'], OUTDATED_TIMEOUT_MS);
    if (outcome.kind === 'failed') {
      return this.unavailable(outcome.error, outcome.message);
    }

    const stdout = outcome.stdout.trim();
    if (!stdout) {
      return { available: true, version: version.version, findings: this.empty() };
    }

    const raw = parseJson(stdout);
    const reported = npmError(raw);
    if (reported) {
      return this.unavailable('other', reported);
    }

    const parsed = OutdatedReportSchema.safeParse(raw);
    if (!parsed.success) {
      return this.unavailable('parse_error', 'npm outdated output could not be parsed');
    }

    const packages: OutdatedPackage[] = [];
    for (const [name, value] of Object.entries(parsed.data)) {
      const entries = Array.isArray(value) ? value : [value];
      for (const entry of entries) {
        packages.push({
          name,
          current: entry.current ?? '',
          wanted: entry.wanted ?? '',
          latest: entry.latest ?? '',
        });
      }
    }

    return { available: true, version: version.version, findings: { packages } };
  }
}

// ═══════════════════════════════════════════════════════════════
// INSTALLED
// ═══════════════════════════════════════════════════════════════

export class NpmInstalledProbe extends BaseProbe<InstalledFindings> {
  readonly name = 'npm-ls';

  protected empty(): InstalledFindings {
    return { count: 0 };
  }

  protected async collect(): Promise<ProbeResult<InstalledFindings>> {
    const version = await this.detectVersion('npm', ['--version']);
    if (!version.ok) return version.result;

    const outcome = await this.exec('npm', ['ls', '--json', '--depth=0'], LIST_TIMEOUT_MS);
    if (outcome.kind === 'failed') {
      return this.unavailable(outcome.error, outcome.message);
    }

    const parsed = ListReportSchema.safeParse(parseJson(outcome.stdout));
    if (!parsed.success) {
      return this.unavailable('parse_error', 'npm ls output could not be parsed');
    }

    return {
      available: true,
      version: version.version,
      findings: { count: Object.keys(parsed.data.dependencies).length },
    };
  }
}
