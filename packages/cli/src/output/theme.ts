import chalk, { type ChalkInstance } from 'chalk'
import type { Dataset } from '@sciregistry/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _outcomeColors: Record<string, ChalkInstance> = {
  Permit:  t.green,
  Applied: t.blue,
  Deny:    t.red,
  Failed:  t.amber,
}

export const outcomeColor = (outcome: string): ChalkInstance =>
  _outcomeColors[outcome] ?? t.muted

/** `complete`, `incomplete` or `invalidated`, colored. */
export const datasetState = (d: Pick<Dataset, 'complete' | 'invalidated'>): string => {
  if (d.invalidated) return t.red('invalidated')
  return d.complete ? t.green('complete') : t.amber('incomplete')
}
