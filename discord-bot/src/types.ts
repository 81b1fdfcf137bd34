export type EventStart =
  | { kind: 'instant'; at: Date }
  | { kind: 'date'; date: string }; // YYYY-MM-DD, all-day

export type CalendarEvent = {
  id: string;
  title: string;
  start: EventStart;
  end?: EventStart | null;
  location?: string | null;
  description?: string | null;
  link?: string | null;
};

export type Audience = {
  key: string;
  channelId: string;
  locale?: string; // set when the audience wants translated text
};

export type SnapshotEntry = {
  title: string;
  start: string; // display string, as rendered when the snapshot was taken
};

// event id -> entry
export type EventSnapshot = Record<string, SnapshotEntry>;

export type DomainName = 'events' | 'trains';

export type OnDemandDedup = 'ignore' | 'consult' | 'update';

export type EmbedField = {
  name: string;
  value: string;
  inline?: boolean;
};

export type EmbedPayload = {
  title: string;
  description?: string;
  color?: number;
  fields: EmbedField[];
  footer?: string;
};

export type MessagePayload =
  | { kind: 'text'; content: string }
  | { kind: 'embed'; embed: EmbedPayload };

export type PostedMessage = {
  id: string;
  authorId: string;
  embedTitles: string[];
};

export type DisplayOptions = {
  utcOffsetMinutes: number;
};
