/**
 * @fileoverview Status tag parsing and lookup
 * @module core/StatusTags
 *
 * Free-form labels from upstream documents become typed tags. Labels the
 * reporting layer does not recognize are kept as `custom` rather than dropped.
 */

import type { StatusKind, StatusTag, Task } from '../types';
import { STATUS_LABEL_ALIASES, STATUS_LABELS } from './Constants';

/**
 * Map a free-form label to a status tag (case-insensitive)
 *
 * @example
 * parseStatusTag('crit');    // { kind: 'critical' }
 * parseStatusTag('blocked'); // { kind: 'custom', label: 'blocked' }
 */
export function parseStatusTag(label: string): StatusTag {
    const trimmed = label.trim();
    const kind = STATUS_LABEL_ALIASES[trimmed.toLowerCase()];
    switch (kind) {
        case 'done':
            return { kind: 'done' };
        case 'active':
            return { kind: 'active' };
        case 'critical':
            return { kind: 'critical' };
        default:
            return { kind: 'custom', label: trimmed };
    }
}

/**
 * Parse a label list into tags, dropping blanks and duplicates
 */
export function parseStatusTags(labels: readonly string[]): StatusTag[] {
    const tags: StatusTag[] = [];
    const seen = new Set<string>();
    for (const label of labels) {
        if (label.trim() === '') continue;
        const tag = parseStatusTag(label);
        const key = formatStatusTag(tag);
        if (seen.has(key)) continue;
        seen.add(key);
        tags.push(tag);
    }
    return tags;
}

/**
 * Label written out for a tag
 */
export function formatStatusTag(tag: StatusTag): string {
    switch (tag.kind) {
        case 'custom':
            return tag.label;
        default:
            return STATUS_LABELS[tag.kind];
    }
}

export function hasStatus(task: Task, kind: StatusKind): boolean {
    return task.status.some(tag => tag.kind === kind);
}
