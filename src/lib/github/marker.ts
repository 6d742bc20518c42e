/**
 * Comment identity markers
 *
 * Each status comment carries an invisible HTML comment naming the mode,
 * folder and kind it reports on. Later runs find their comment by it.
 */

export type CommentKind = 'plan' | 'lint' | 'cost' | 'failure' | 'apply';

export interface CommentIdentity {
  mode: string;
  folder: string;
  kind: CommentKind;
  /** Full HTML comment replacing the generated marker */
  marker?: string;
}

const MARKER_PREFIX = 'iac-pilot';

/**
 * Keep the marker a single valid HTML comment whatever the folder name
 */
function sanitize(part: string): string {
  return part.replace(/\s+/g, '_').replace(/-{2,}/g, '-').replace(/>/g, '');
}

export function isHtmlCommentMarker(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.startsWith('<!--') && trimmed.endsWith('-->');
}

export function commentMarker(identity: CommentIdentity): string {
  if (identity.marker && isHtmlCommentMarker(identity.marker)) {
    return identity.marker.trim();
  }
  return `<!-- ${MARKER_PREFIX}:${sanitize(identity.mode)}:${identity.kind}:${sanitize(identity.folder)} -->`;
}

export function withMarker(body: string, marker: string): string {
  if (body.includes(marker)) return body;
  return `${body.trimEnd()}\n\n${marker}\n`;
}
