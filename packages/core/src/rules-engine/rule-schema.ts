import { z } from 'zod';
import { InvalidRuleError, MalformedSourceError } from '../shared/errors.js';
import { CONDITION_OPERATORS, type RuleDefinition } from './types.js';

const ConditionSchema = z.object({
  field: z.string().min(1),
  operator: z.enum(CONDITION_OPERATORS),
  value: z.union([z.number().finite(), z.string()]),
});

const RuleSchema = z.object({
  id: z.string().min(1),
  priority: z.number().int(),
  description: z.string().default(''),
  conditions: z.array(ConditionSchema),
  result: z.object({
    risk: z.string(),
    action: z.string(),
  }),
});

/**
 * Portuguese keys used by the first generation of rule files
 * (`{"prioridade": 1, "condicoes": [{"variavel": ...}], "resultado": {"risco": ...}}`).
 * The English key wins when a rule carries both.
 */
const KEY_ALIASES: Readonly<Record<string, string>> = {
  regras: 'rules',
  prioridade: 'priority',
  descricao: 'description',
  condicoes: 'conditions',
  variavel: 'field',
  operador: 'operator',
  valor: 'value',
  resultado: 'result',
  risco: 'risk',
  acao: 'action',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeKeys);
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const canonical = KEY_ALIASES[key] ?? key;
    if (canonical !== key && Object.hasOwn(value, canonical)) continue;
    out[canonical] = normalizeKeys(entry);
  }
  return out;
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === 'invalid_type' && issue.received === 'undefined') return 'is required';
  return issue.message;
}

function ruleLabel(raw: unknown, index: number): string {
  if (isPlainObject(raw) && typeof raw.id === 'string' && raw.id.length > 0) return raw.id;
  return `#${index}`;
}

export function parseRule(raw: unknown, index: number, source: string): RuleDefinition {
  const parsed = RuleSchema.safeParse(normalizeKeys(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'rule';
    throw new InvalidRuleError(source, ruleLabel(raw, index), field, describeIssue(issue));
  }
  return parsed.data;
}

/**
 * Validate a parsed rule document. Accepts a bare array of rules or
 * `{ rules: [...] }`; rules come back in document order.
 */
export function parseRuleDocument(document: unknown, source: string): RuleDefinition[] {
  const normalized = normalizeKeys(document);
  const rules = isPlainObject(normalized) ? normalized.rules : normalized;

  if (!Array.isArray(rules)) {
    throw new MalformedSourceError(source, 'expected an array of rules or { rules: [...] }');
  }

  return rules.map((raw, index) => parseRule(raw, index, source));
}
