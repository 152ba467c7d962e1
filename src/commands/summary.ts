import type { ProvisionReport, StowOutcome } from '../core/types.js';

function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : (plural || `${singular}s`);
}

export function formatCount(count: number, singular: string, plural?: string): string {
  return `${count} ${pluralize(count, singular, plural)}`;
}

export function formatStowTable(outcomes: StowOutcome[]): string[] {
  const header = { name: 'Package', outcome: 'Outcome', detail: 'Detail' };
  const rows = outcomes.map((o) => ({
    name: o.package,
    outcome: o.outcome,
    detail: o.detail ?? (o.conflicts ? formatCount(o.conflicts.length, 'conflict') : ''),
  }));
  const width = {
    name: Math.max(header.name.length, ...rows.map((r) => r.name.length)),
    outcome: Math.max(header.outcome.length, ...rows.map((r) => r.outcome.length)),
  };
  const pad = (value: string, len: number) => value.padEnd(len, ' ');
  const line = (r: { name: string; outcome: string; detail: string }) =>
    `${pad(r.name, width.name)}  ${pad(r.outcome, width.outcome)}  ${r.detail}`.trimEnd();
  return [line(header), ...rows.map(line)];
}

export function formatProvisionSummary(report: ProvisionReport): string {
  const count = (status: 'ok' | 'skipped' | 'failed') => report.steps.filter((s) => s.status === status).length;
  const pieces = [
    `${count('ok')} done`,
    `${count('skipped')} already satisfied`,
    `${formatCount(count('failed'), 'failure')}`,
  ];
  if (report.aborted) pieces.push('stopped early');
  return pieces.join(' · ');
}
