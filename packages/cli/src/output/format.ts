/**
 * output/format.ts — Human-readable renderings of registry values
 *
 * Pure string builders; commands print what these return.
 */

import type { Dataset, IntegrityReport, PermissionListing, PrincipalSet } from '@sciregistry/kernel'
import type { AuditRecord } from '@sciregistry/runtime-host'
import { datasetState, outcomeColor, t } from './theme.js'

const labelW = 14
const label = (s: string): string => t.muted(s + ' '.repeat(Math.max(1, labelW - s.length)))

export function formatBytes(n: number): string {
  if (n < 1024) return `${n} B`
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KiB`
  return `${(n / (1024 * 1024)).toFixed(1)} MiB`
}

export function renderDataset(d: Dataset): string {
  let out = '\n'
  out += '  ' + t.white.bold(d.title) + '  ' + datasetState(d) + '\n\n'
  out += '  ' + label('id') + t.blue(d.id) + '\n'
  out += '  ' + label('owner') + t.text(d.owner) + '\n'
  out += '  ' + label('author') + t.text(`${d.author} <${d.email}>`) + '\n'
  if (d.organization !== undefined) {
    out += '  ' + label('organization') + t.text(d.organization) + '\n'
  }
  out += '  ' + label('container') + t.text(`${d.container_type.name} (model ${d.model_version})`) + '\n'
  out += '  ' + label('uploaded') + t.text(d.upload_time) + '\n'
  out += '  ' + label('stored') + t.text(d.storage_time ?? '-') + '\n'
  out += '  ' + label('hash') + (d.hash === null ? t.dim('-') : t.blueDim(d.hash)) + '\n'
  out += '  ' + label('replaces') + t.text(d.replaces ?? '-') + '\n'
  out += '  ' + label('size') + t.text(formatBytes(d.size)) + '\n'

  out += '\n  ' + t.muted('files') + '\n'
  if (d.content.length === 0) {
    out += '    ' + t.dim('(none)') + '\n'
  }
  for (const entry of d.content) {
    out += '    ' + t.text(entry.name) + '  ' + t.dim(formatBytes(entry.size)) + '\n'
  }
  return out
}

/** One line of `list` output. */
export function renderDatasetRow(d: Dataset): string {
  return [t.blue(d.id), t.dim(d.upload_time), datasetState(d), t.white(d.title)].join('  ')
}

function principals(set: PrincipalSet): string {
  const parts = [...set.users.map((u) => `user:${u}`), ...set.groups.map((g) => `group:${g}`)]
  return parts.length === 0 ? t.dim('(owner only)') : t.text(parts.join(', '))
}

export function renderPermissions(listing: PermissionListing): string {
  return [
    '  ' + label('owner') + t.white(listing.owner),
    '  ' + label('read') + principals(listing.read),
    '  ' + label('write') + principals(listing.write),
  ].join('\n')
}

/** The chain oldest first, with `current` marked. */
export function renderChain(chain: ReadonlyArray<string>, current: string): string {
  return chain
    .map((id, i) => {
      const marker = id === current ? t.blue('●') : t.dim('○')
      const name = id === current ? t.white(id) : t.text(id)
      return `  ${marker} ${name}` + (i === 0 ? t.dim('  (first)') : '')
    })
    .join('\n')
}

export function renderReport(report: IntegrityReport): string {
  if (report.ok) {
    return t.green('intact') + '  ' + t.blueDim(report.computed)
  }
  const lines = [
    t.red('integrity check failed'),
    '  ' + label('expected') + t.text(report.expected),
    '  ' + label('computed') + t.text(report.computed),
  ]
  for (const f of report.failures) {
    lines.push(`  ${t.red(f.reason)}  ${t.white(f.name)}  ${t.dim(`expected ${f.expected}, got ${f.actual ?? 'nothing'}`)}`)
  }
  return lines.join('\n')
}

export function renderAuditRecord(r: AuditRecord): string {
  const parts = [
    t.dim(r.timestamp),
    outcomeColor(r.outcome)(r.outcome.padEnd(7)),
    t.text(r.requester),
    t.white(r.operation),
    t.blue(r.dataset_id ?? '-'),
  ]
  if (r.error_code !== null) parts.push(t.red(r.error_code))
  if (r.detail !== null) parts.push(t.muted(r.detail))
  return parts.join('  ')
}
