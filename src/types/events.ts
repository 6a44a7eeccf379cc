export type PropertyValue = string | number | boolean;

/**
 * Flat key/value bag attached to events, signals and user traits.
 * Keys keep their insertion order on the wire.
 */
export type Properties = Readonly<Record<string, PropertyValue>>;

export type AttachmentType = 'text' | 'code' | 'other';
export type AttachmentRole = 'input' | 'output';

export interface Attachment {
  readonly type: AttachmentType;
  readonly name: string;
  readonly value: string;
  readonly role: AttachmentRole;
  readonly language?: string;
}

export type SignalType = 'default' | 'feedback';
export type Sentiment = 'POSITIVE' | 'NEGATIVE' | 'NEUTRAL';

export interface EventRecord {
  readonly kind: 'event';
  readonly id: string;
  readonly userId: string;
  readonly event: string;
  readonly model?: string;
  readonly input?: string;
  readonly output?: string;
  readonly convoId?: string;
  readonly properties: Properties;
  readonly attachments: readonly Attachment[];
  readonly timestamp: string;
}

export interface SignalRecord {
  readonly kind: 'signal';
  readonly id: string;
  readonly eventId: string;
  readonly name: string;
  readonly type: SignalType;
  readonly sentiment?: Sentiment;
  readonly comment?: string;
  readonly properties: Properties;
  readonly timestamp: string;
}

export interface IdentifyRecord {
  readonly kind: 'identify';
  readonly id: string;
  readonly userId: string;
  readonly traits: Properties;
  readonly timestamp: string;
}

export interface EventInput {
  eventId?: string;
  userId: string;
  event: string;
  model?: string;
  input?: string;
  output?: string;
  convoId?: string;
  properties?: Record<string, PropertyValue>;
  attachments?: Attachment[];
  timestamp?: Date;
}

export interface SignalInput {
  eventId: string;
  name: string;
  type?: SignalType;
  sentiment?: Sentiment;
  comment?: string;
  properties?: Record<string, PropertyValue>;
  timestamp?: Date;
}

export interface InteractionInput {
  eventId?: string;
  userId: string;
  event: string;
  input?: string;
  model?: string;
  convoId?: string;
  properties?: Record<string, PropertyValue>;
}

export interface FinishInput {
  output: string;
  attachments?: Attachment[];
  properties?: Record<string, PropertyValue>;
}
