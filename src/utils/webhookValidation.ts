import { body, matchedData, validationResult, ValidationChain } from 'express-validator';
import { WebhookRequest } from '../types/domain';
import { BadRequestError } from '../errors/AppError';

export interface UrlRules {
  allowInsecureUrls: boolean;
}

function urlOptions(rules: UrlRules) {
  return {
    protocols: rules.allowInsecureUrls ? ['https', 'http'] : ['https'],
    require_protocol: true,
    require_tld: false
  };
}

// Only async requests need somewhere to send the result
const expectsCallback = (_value: unknown, { req }: { req: { body?: { async_processing?: unknown } } }) =>
  req.body?.async_processing !== false;

export function webhookRequestValidators(rules: UrlRules): ValidationChain[] {
  return [
    body('job_id')
      .isString().withMessage('job_id must be a string').bail()
      .trim()
      .notEmpty().withMessage('job_id cannot be empty'),
    body('url')
      .isString().withMessage('url must be a string').bail()
      .trim()
      .isURL(urlOptions(rules)).withMessage('url must be a valid URL'),
    body('async_processing')
      .optional()
      .custom((value) => typeof value === 'boolean').withMessage('async_processing must be a boolean'),
    body('callback_url')
      .if(expectsCallback)
      .exists({ values: 'falsy' }).withMessage('callback_url is required for async processing').bail()
      .isString().withMessage('callback_url must be a string').bail()
      .trim()
      .notEmpty().withMessage('callback_url cannot be empty').bail()
      .isURL(urlOptions(rules)).withMessage('callback_url must be a valid URL')
  ];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(rawBody: Buffer): unknown {
  try {
    return JSON.parse(rawBody.toString('utf8'));
  } catch {
    throw new BadRequestError({ reason: 'body is not valid JSON' });
  }
}

/**
 * Turns verified raw bytes into a WebhookRequest.
 * Throws BadRequestError; the details are for logs, not for the caller.
 */
export async function parseWebhookRequest(rawBody: Buffer, rules: UrlRules): Promise<WebhookRequest> {
  const parsed = parseJson(rawBody);
  if (!isPlainObject(parsed)) {
    throw new BadRequestError({ reason: 'body is not a JSON object' });
  }

  const req = { body: parsed };
  await Promise.all(webhookRequestValidators(rules).map((chain) => chain.run(req)));

  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    throw new BadRequestError({
      fields: errors.array().map((error) => (error.type === 'field' ? error.path : error.type))
    });
  }

  const data: Record<string, unknown> = matchedData(req);
  const asyncProcessing = data.async_processing !== false;

  return {
    jobId: String(data.job_id),
    url: String(data.url),
    asyncProcessing,
    callbackUrl: asyncProcessing && typeof data.callback_url === 'string' ? data.callback_url : undefined
  };
}
