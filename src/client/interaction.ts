import { SealedBuilderError } from '../errors';
import { Attachment, EventInput, EventRecord, FinishInput, PropertyValue } from '../types/events';
import { attachmentListSchema, finishInputSchema, validate } from '../validation/schemas';

/**
 * Receives the finished event. Throws when the record cannot be accepted.
 */
export type InteractionSink = (input: EventInput & { eventId: string }) => EventRecord;

export interface InteractionState {
  id: string;
  userId: string;
  event: string;
  input?: string;
  model?: string;
  convoId?: string;
  properties: Record<string, PropertyValue>;
}

/**
 * A partial event: opened with the user's input, enriched while the model
 * works, and finished exactly once into a single EventRecord.
 */
export class Interaction {
  readonly id: string;

  private readonly state: InteractionState;
  private readonly attachments: Attachment[] = [];
  private finished?: EventRecord;

  constructor(state: InteractionState, private readonly sink: InteractionSink) {
    this.id = state.id;
    this.state = { ...state, properties: { ...state.properties } };
  }

  addAttachments(attachments: Attachment[]): this {
    this.assertOpen();
    const checked = validate(attachmentListSchema, attachments, 'attachments');
    this.attachments.push(...checked);
    return this;
  }

  setProperty(key: string, value: PropertyValue): this {
    this.assertOpen();
    this.state.properties[key] = value;
    return this;
  }

  setInput(input: string): this {
    this.assertOpen();
    this.state.input = input;
    return this;
  }

  /**
   * Emits the event. If the sink refuses it the interaction stays open.
   */
  finish(input: FinishInput): EventRecord {
    this.assertOpen();
    const checked = validate(finishInputSchema, input, 'interaction output');

    const record = this.sink({
      eventId: this.state.id,
      userId: this.state.userId,
      event: this.state.event,
      model: this.state.model,
      input: this.state.input,
      output: checked.output,
      convoId: this.state.convoId,
      properties: { ...this.state.properties, ...checked.properties },
      attachments: [...this.attachments, ...(checked.attachments ?? [])]
    });

    this.finished = record;
    return record;
  }

  isFinished(): boolean {
    return this.finished !== undefined;
  }

  /**
   * The record emitted by finish(), if any
   */
  result(): EventRecord | undefined {
    return this.finished;
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new SealedBuilderError(this.id);
    }
  }
}
