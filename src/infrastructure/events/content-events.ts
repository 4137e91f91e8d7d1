/**
 * Content-mutation signals the host publishes
 */
export const CONTENT_EVENTS = [
  'content.created',
  'content.updated',
  'content.deleted',
  'content.trashed',
  'content.restored',
  'comment.posted',
  'comment.status_changed',
] as const;

export type ContentEventName = (typeof CONTENT_EVENTS)[number];

export type ContentId = string | number;

export interface ContentEventPayload {
  contentId?: ContentId | null;
}

export type ContentEventHandler = (
  payload: ContentEventPayload,
  event: ContentEventName,
) => Promise<void> | void;

export function isContentEvent(value: string): value is ContentEventName {
  return CONTENT_EVENTS.some((event) => event === value);
}
