import Joi from 'joi';
import { ValidationError } from '../errors';
import {
  Attachment,
  EventInput,
  FinishInput,
  InteractionInput,
  PropertyValue,
  SignalInput
} from '../types/events';
import { SessionOutcome } from '../types/session';

const identifier = Joi.string().trim().min(1);

const propertyValue = Joi.alternatives().try(
  Joi.string().allow(''),
  Joi.number(),
  Joi.boolean()
);

export const propertiesSchema = Joi.object<Record<string, PropertyValue>>()
  .pattern(Joi.string(), propertyValue);

export const attachmentSchema = Joi.object<Attachment>({
  type: Joi.string().valid('text', 'code', 'other').required(),
  name: Joi.string().required(),
  value: Joi.string().allow('').required(),
  role: Joi.string().valid('input', 'output').required(),
  language: Joi.string().optional()
});

export const eventInputSchema = Joi.object<EventInput>({
  eventId: identifier.optional(),
  userId: identifier.required().messages({
    'any.required': 'Event requires a user id',
    'string.empty': 'Event requires a user id'
  }),
  event: identifier.required().messages({
    'any.required': 'Event requires a name',
    'string.empty': 'Event requires a name'
  }),
  model: Joi.string().optional(),
  input: Joi.string().allow('').optional(),
  output: Joi.string().allow('').optional(),
  convoId: Joi.string().optional(),
  properties: propertiesSchema.optional(),
  attachments: Joi.array<Attachment[]>().items(attachmentSchema).optional(),
  timestamp: Joi.date().optional()
});

export const signalInputSchema = Joi.object<SignalInput>({
  eventId: identifier.required().messages({
    'any.required': 'Signal must reference an event id',
    'string.empty': 'Signal must reference an event id'
  }),
  name: identifier.required(),
  type: Joi.string().valid('default', 'feedback').default('default'),
  sentiment: Joi.string().valid('POSITIVE', 'NEGATIVE', 'NEUTRAL').optional(),
  comment: Joi.string().allow('').optional(),
  properties: propertiesSchema.optional(),
  timestamp: Joi.date().optional()
});

export const interactionInputSchema = Joi.object<InteractionInput>({
  eventId: identifier.optional(),
  userId: identifier.required(),
  event: identifier.required(),
  input: Joi.string().allow('').optional(),
  model: Joi.string().optional(),
  convoId: Joi.string().optional(),
  properties: propertiesSchema.optional()
});

export const finishInputSchema = Joi.object<FinishInput>({
  output: Joi.string().allow('').required(),
  attachments: Joi.array<Attachment[]>().items(attachmentSchema).optional(),
  properties: propertiesSchema.optional()
});

export const attachmentListSchema = Joi.array<Attachment[]>().items(attachmentSchema);

const tokenCount = Joi.number().integer().min(0);

export const sessionOutcomeSchema = Joi.object<SessionOutcome>({
  success: Joi.boolean().required(),
  failureReason: Joi.string().optional(),
  durationMs: Joi.number().min(0).optional(),
  estimatedCost: Joi.number().min(0).optional(),
  promptTokens: tokenCount.optional(),
  completionTokens: tokenCount.optional(),
  totalTokens: tokenCount.optional(),
  customMetrics: Joi.object<Record<string, number>>().pattern(Joi.string(), Joi.number()).optional()
});

export const llmCallSchema = Joi.object<{ promptTokens: number; completionTokens: number; costEstimate: number }>({
  promptTokens: tokenCount.required(),
  completionTokens: tokenCount.required(),
  costEstimate: Joi.number().min(0).required()
});

/**
 * Validate a value against a schema, throwing ValidationError with every problem found
 */
export function validate<T>(schema: Joi.AnySchema<T>, value: unknown, label: string): T {
  const { error, value: validated } = schema.validate(value, { abortEarly: false });

  if (error) {
    const details = error.details.map(detail => detail.message);
    throw new ValidationError(`Invalid ${label}: ${details.join('; ')}`, details);
  }

  return validated;
}
