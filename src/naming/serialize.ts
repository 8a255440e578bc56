/**
 * Conversion between tokens/rules and their persisted records.
 *
 * Each entity has an explicit schema. Records are validated with Ajv before
 * anything is built from them: unknown attributes, a wrong `_classname` or an
 * unsupported `_version` are rejected instead of merged into live objects.
 */

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import { Rule } from './rule.js';
import { Token } from './token.js';
import { TokenNumber } from './token-number.js';
import {
  type AnyToken,
  type AnyTokenData,
  type RuleData,
  SERIAL_VERSION,
  type TokenData,
  type TokenNumberData,
} from './types.js';

const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });

const tokenSchema = {
  type: 'object',
  properties: {
    _classname: { const: 'Token' },
    _version: { const: SERIAL_VERSION },
    name: { type: 'string', minLength: 1 },
    default: { type: ['string', 'null'] },
    options: { type: 'object', additionalProperties: { type: 'string' } },
  },
  required: ['_classname', '_version', 'name', 'default', 'options'],
  additionalProperties: false,
} as const;

const tokenNumberSchema = {
  type: 'object',
  properties: {
    _classname: { const: 'TokenNumber' },
    _version: { const: SERIAL_VERSION },
    name: { type: 'string', minLength: 1 },
    prefix: { type: 'string' },
    suffix: { type: 'string' },
    padding: { type: 'integer' },
  },
  required: ['_classname', '_version', 'name', 'prefix', 'suffix', 'padding'],
  additionalProperties: false,
} as const;

const ruleSchema = {
  type: 'object',
  properties: {
    _classname: { const: 'Rule' },
    _version: { const: SERIAL_VERSION },
    name: { type: 'string', minLength: 1 },
    fields: { type: 'array', items: { type: 'string' }, minItems: 1 },
  },
  required: ['_classname', '_version', 'name', 'fields'],
  additionalProperties: false,
} as const;

const validateTokenData: ValidateFunction<TokenData> = ajv.compile<TokenData>(tokenSchema);
const validateTokenNumberData: ValidateFunction<TokenNumberData> =
  ajv.compile<TokenNumberData>(tokenNumberSchema);
const validateRuleData: ValidateFunction<RuleData> = ajv.compile<RuleData>(ruleSchema);

/**
 * Outcome of reading a record: the entity, or the reasons it was rejected
 */
export type FromDataResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly string[] };

export function tokenToData(token: AnyToken): AnyTokenData {
  if (token.kind === 'number') {
    return {
      _classname: 'TokenNumber',
      _version: SERIAL_VERSION,
      name: token.name,
      prefix: token.prefix,
      suffix: token.suffix,
      padding: token.padding,
    };
  }
  return {
    _classname: 'Token',
    _version: SERIAL_VERSION,
    name: token.name,
    default: token.defaultName ?? null,
    options: token.options,
  };
}

export function ruleToData(rule: Rule): RuleData {
  return {
    _classname: 'Rule',
    _version: SERIAL_VERSION,
    name: rule.name,
    fields: rule.fields,
  };
}

/**
 * Build a Token or TokenNumber from a record, dispatching on `_classname`
 */
export function tokenFromData(data: unknown): FromDataResult<AnyToken> {
  const classname = readClassname(data);
  switch (classname) {
    case 'Token':
      return buildToken(data);
    case 'TokenNumber':
      return buildTokenNumber(data);
    default:
      return {
        ok: false,
        errors: [`Unknown token class: '${classname ?? '(missing)'}'`],
      };
  }
}

export function ruleFromData(data: unknown): FromDataResult<Rule> {
  if (!validateRuleData(data)) {
    return { ok: false, errors: formatValidationErrors(validateRuleData.errors ?? []) };
  }
  return { ok: true, value: new Rule(data.name, data.fields) };
}

function buildToken(data: unknown): FromDataResult<AnyToken> {
  if (!validateTokenData(data)) {
    return { ok: false, errors: formatValidationErrors(validateTokenData.errors ?? []) };
  }
  const token = new Token(data.name);
  for (const [fullName, abbreviation] of Object.entries(data.options)) {
    token.addOption(fullName, abbreviation);
  }
  if (data.default !== null) {
    if (!Object.prototype.hasOwnProperty.call(data.options, data.default)) {
      return {
        ok: false,
        errors: [`Default '${data.default}' is not an option of Token '${data.name}'`],
      };
    }
    token.default = data.default;
  }
  return { ok: true, value: token };
}

function buildTokenNumber(data: unknown): FromDataResult<AnyToken> {
  if (!validateTokenNumberData(data)) {
    return { ok: false, errors: formatValidationErrors(validateTokenNumberData.errors ?? []) };
  }
  const token = new TokenNumber(data.name);
  token.prefix = data.prefix;
  token.suffix = data.suffix;
  token.padding = data.padding;
  return { ok: true, value: token };
}

function readClassname(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('_classname' in data)) {
    return undefined;
  }
  return typeof data._classname === 'string' ? data._classname : undefined;
}

/**
 * Format Ajv validation errors into human-readable messages
 */
function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'required':
        return `Missing required property: '${String(error.params.missingProperty)}'`;

      case 'type':
        return `Property '${path}' must be of type ${String(error.params.type)}`;

      case 'const':
        return `Property '${path}' must be ${JSON.stringify(error.params.allowedValue)}`;

      case 'minLength':
        return `Property '${path}' must be at least ${String(error.params.limit)} characters`;

      case 'minItems':
        return `Property '${path}' must have at least ${String(error.params.limit)} items`;

      case 'additionalProperties':
        return `Unknown property: '${String(error.params.additionalProperty)}'`;

      default:
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
