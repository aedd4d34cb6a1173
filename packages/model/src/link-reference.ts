export type LinkOrigin = 'annotation' | 'text';

/**
 * Link whose target is a known chapter (and, usually, section)
 */
export interface ResolvedLinkReference {
  kind: 'resolved';
  origin: LinkOrigin;
  sourceBlockId: string;
  targetChapterId: string;
  // Absent when the link targets the chapter itself
  targetSectionId?: string;
  label: string;
}

/**
 * Reference that could not be mapped to a target; rendered as plain text
 */
export interface UnresolvedLinkReference {
  kind: 'unresolved';
  origin: LinkOrigin;
  sourceBlockId: string;
  label: string;
  reason: 'no-target' | 'ambiguous' | 'outside-document';
}

/**
 * Link to a location outside the document; passed through unchanged
 */
export interface ExternalLinkReference {
  kind: 'external';
  origin: 'annotation';
  sourceBlockId: string;
  uri: string;
  label: string;
}

export type LinkReference =
  | ResolvedLinkReference
  | UnresolvedLinkReference
  | ExternalLinkReference;
