import Joi from 'joi';
import { FlightStatus } from '../../domain/entities/Policy';

const unixSeconds = Joi.number().integer().min(0);

export const policyIdParamsSchema = Joi.object({
  policyId: Joi.number()
    .integer()
    .min(1)
    .required()
    .messages({
      'number.base': 'Policy ID must be a number',
      'number.integer': 'Policy ID must be an integer',
      'number.min': 'Policy ID must be at least 1'
    })
});

export const holderSchema = Joi.string()
  .trim()
  .min(1)
  .max(128)
  .messages({
    'string.empty': 'Holder cannot be empty',
    'string.max': 'Holder cannot exceed 128 characters'
  });

export const amountSchema = Joi.string()
  .pattern(/^\d{1,78}$/)
  .messages({
    'string.pattern.base': 'Amount must be a non-negative integer in base units, as a decimal string'
  });

export const createPolicySchema = Joi.object({
  body: Joi.object({
    holder: holderSchema.optional(),
    flightCode: Joi.string().trim().min(1).max(32).required(),
    scheduledDeparture: unixSeconds.required(),
    scheduledArrival: unixSeconds.required(),
    paidAmount: amountSchema.required()
  }).required()
});

export const getPolicySchema = Joi.object({
  params: policyIdParamsSchema
});

export const getHolderPoliciesSchema = Joi.object({
  params: Joi.object({
    holder: holderSchema.required()
  })
});

export const updateFlightInfoSchema = Joi.object({
  params: policyIdParamsSchema,
  body: Joi.object({
    actualArrival: unixSeconds.allow(null).required(),
    flightStatus: Joi.string()
      .valid(...Object.values(FlightStatus))
      .required()
  }).required()
});

export const evaluatePolicySchema = Joi.object({
  params: policyIdParamsSchema,
  body: Joi.object({})
});

export const withdrawSchema = Joi.object({
  body: Joi.object({
    destination: holderSchema.required()
  }).required()
});
