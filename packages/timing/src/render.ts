/**
 * Textual dump of recorders.
 *
 *   <ScopeTimer name=root intervals=[0.5000] min=0.5000 mean=0.5000 max=0.5000 children=[
 *       <ScopeTimer name=task1 ...>,
 *       <ScopeTimer name=task2 ...>
 *   ]>
 *
 * The format is consumed by tooling that parses it, so spacing is exact:
 * children are joined with ", " and each child line starts with a newline
 * plus four spaces per depth level.
 */

import type { IntervalHistory } from './interval-history'
import type { IntervalRecorder } from './recorder'
import type { ScopeTimer } from './scope-timer'

/** Interval values listed before the list is cut with "...". */
export const MAX_RENDERED_INTERVALS = 5

const INDENT = '    '

export function formatSeconds(value: number): string {
  return value.toFixed(4)
}

/** `intervals=[..] min=.. mean=.. max=..`, or nothing for an empty history. */
export function statisticsFields(history: IntervalHistory): string[] {
  if (history.empty) return []
  const listed: string[] = []
  for (const value of history) {
    if (listed.length === MAX_RENDERED_INTERVALS) break
    listed.push(formatSeconds(value))
  }
  if (history.size > MAX_RENDERED_INTERVALS) listed.push('...')
  return [
    `intervals=[${listed.join(', ')}]`,
    `min=${formatSeconds(history.min())}`,
    `mean=${formatSeconds(history.mean())}`,
    `max=${formatSeconds(history.max())}`,
  ]
}

/** Flat rendering of any recorder, without name or children. */
export function renderRecorder(recorder: IntervalRecorder): string {
  return '<' + [recorder.kind, ...statisticsFields(recorder.history)].join(' ') + '>'
}

/** Recursive rendering of a ScopeTimer and its subtree. */
export function renderScopeTimer(node: ScopeTimer): string {
  return renderNode(node, node.depth)
}

function renderNode(node: ScopeTimer, depth: number): string {
  const indent = INDENT.repeat(depth)
  const props = [`name=${node.name}`, ...statisticsFields(node.history)]
  if (node.children.size > 0) {
    const rendered: string[] = []
    for (const child of node.children.values()) {
      rendered.push(renderNode(child, depth + 1))
    }
    props.push(`children=[${rendered.join(', ')}\n${indent}]`)
  }
  return `${depth > 0 ? '\n' : ''}${indent}<${node.kind} ${props.join(' ')}>`
}
