import Joi from 'joi';

export const runIterationSchema = Joi.object({
  body: Joi.object({
    brandName: Joi.string().trim().min(1).max(200).required().messages({
      'string.empty': 'Brand name cannot be empty',
      'any.required': 'Brand name is required'
    }),
    industry: Joi.string().trim().max(200).allow(''),
    targetAudience: Joi.string().trim().max(500).allow(''),
    productInfo: Joi.string().trim().max(2000).allow(''),
    useApiTrends: Joi.boolean(),
    generateImage: Joi.boolean()
  }).required()
});

// Range checks are left to the council so out-of-range indices get a 404
export const iterationIndexSchema = Joi.object({
  params: Joi.object({
    index: Joi.number().required().messages({
      'number.base': 'Iteration index must be a number'
    })
  })
});

export const compareIterationsSchema = Joi.object({
  query: Joi.object({
    first: Joi.number().required(),
    second: Joi.number().required()
  })
});

export const recentEventsSchema = Joi.object({
  query: Joi.object({
    replay: Joi.number().integer().min(0).max(500).default(50)
  })
});
