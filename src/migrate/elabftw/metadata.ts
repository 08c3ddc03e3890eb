/**
 * Experiment title, tags and extra-field metadata for one project group.
 */

import type { ExperimentMetadata, ExtraField, PreparedGroup } from '../types.js';
import { UNGROUPED_PROJECT_ID } from '../types.js';
import { authorName } from '../grouper.js';
import type { Lookups } from '../lookups.js';

export const LABFOLDER_PROJECT_FIELD = 'Labfolder Project ID';

export const EXTRA_FIELDS_GROUP = { id: 1, name: 'Labfolder' } as const;

export interface GroupMetadata {
  metadata: ExperimentMetadata;
  /** Destination owner, when the user map supplies a numeric ID */
  userId?: number;
  /** ISA-study item ID, when the ISA list has one for the project */
  isaId?: string;
}

function field(value: string, type: ExtraField['type'] = 'text'): ExtraField {
  return { type, value, group_id: EXTRA_FIELDS_GROUP.id, description: '' };
}

export function experimentTitle(group: PreparedGroup): string {
  if (group.projectId === UNGROUPED_PROJECT_ID) {
    return 'Labfolder entries without project';
  }
  const title = group.entries.find((transformed) => transformed.entry.projectTitle)?.entry.projectTitle;
  return title || `Labfolder project ${group.projectId}`;
}

/** Union of entry tags, first occurrence wins */
export function experimentTags(group: PreparedGroup): string[] {
  const tags = new Set<string>();
  for (const { entry } of group.entries) {
    for (const tag of entry.tags) tags.add(tag);
  }
  return [...tags];
}

export function buildGroupMetadata(group: PreparedGroup, lookups: Lookups): GroupMetadata {
  const first = group.entries[0]?.entry;
  const extraFields: Record<string, ExtraField> = {
    'Project Owner': field(first ? authorName(first.author) : ''),
    'Project creation date': field(first?.projectCreatedAt ?? ''),
    [LABFOLDER_PROJECT_FIELD]: field(group.projectId),
  };

  const isaId = lookups.isaIdFor(group.projectId);
  if (isaId) {
    extraFields['ISA-Study'] = field(isaId, /^\d+$/.test(isaId) ? 'items' : 'text');
  }

  const user = first ? lookups.userFor(first.author) : undefined;
  if (user?.username) {
    extraFields['eLabFTW User'] = field(user.username);
  }

  return {
    metadata: {
      elabftw: {
        display_main_text: true,
        extra_fields_groups: [{ ...EXTRA_FIELDS_GROUP }],
      },
      extra_fields: extraFields,
    },
    userId: user?.userId,
    isaId,
  };
}
