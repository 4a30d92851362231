// Change records - dated attribute changes read from an external event log

/**
 * A single attribute change, in the same "<text> (<start>:<end>)" form as
 * declaration lines.
 */
export type ChangeTag = {
  tag: string;
  value: string;
};

/**
 * A dated change against one entity. The target is free text and may be
 * inflected or misspelled.
 */
export type ChangeRecord = {
  /**
   * Date the change happened ("2026-02-01" or a full ISO timestamp)
   */
  date: string;

  target: string;

  tags: ChangeTag[];

  /**
   * Where the record came from, e.g. a session log name
   */
  source?: string;
};
