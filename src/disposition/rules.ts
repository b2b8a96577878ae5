import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DISPOSITION_CONNECTION_MAP, DISPOSITION_NAMES, type Disposition } from './types';

const DispositionSchema = z.enum(DISPOSITION_NAMES);

const KeywordListSchema = z.array(z.string().min(1));

const ClassifierRuleSchema = z
  .object({
    name: z.string().min(1),
    priority: z.number().int(),
    anyKeywords: KeywordListSchema.optional(),
    allKeywords: KeywordListSchema.optional(),
    minWords: z.number().int().positive().optional(),
    disposition: DispositionSchema,
    withDateDisposition: DispositionSchema.optional(),
  })
  .superRefine((rule, ctx) => {
    const hasCondition =
      (rule.anyKeywords?.length ?? 0) > 0 ||
      (rule.allKeywords?.length ?? 0) > 0 ||
      rule.minWords !== undefined;
    if (!hasCondition) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'rule needs anyKeywords, allKeywords or minWords',
        path: ['anyKeywords'],
      });
    }
    for (const key of ['disposition', 'withDateDisposition'] as const) {
      const value = rule[key];
      if (value && DISPOSITION_CONNECTION_MAP[value] !== 'CONNECTED') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${value} is not a connected-call disposition`,
          path: [key],
        });
      }
    }
  });

const DialFailureRuleSchema = z
  .object({
    anyKeywords: KeywordListSchema.min(1),
    disposition: DispositionSchema,
  })
  .superRefine((rule, ctx) => {
    if (DISPOSITION_CONNECTION_MAP[rule.disposition] !== 'NOT_CONNECTED') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${rule.disposition} is not a dial-failure disposition`,
        path: ['disposition'],
      });
    }
  });

const PatternSchema = z.string().superRefine((value, ctx) => {
  try {
    new RegExp(value, 'i');
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
});

export const DispositionRuleFileSchema = z.object({
  contractVersion: z.literal('v1'),
  shortCallSeconds: z.number().positive().default(10),
  datePatterns: z.array(PatternSchema).min(1),
  rules: z.array(ClassifierRuleSchema).min(1),
  fallback: DispositionSchema.refine((value) => DISPOSITION_CONNECTION_MAP[value] === 'CONNECTED', {
    message: 'fallback must be a connected-call disposition',
  }),
  dialFailure: z.array(DialFailureRuleSchema).min(1),
});

export type DispositionRuleFile = z.infer<typeof DispositionRuleFileSchema>;

export interface CompiledRule {
  name: string;
  priority: number;
  anyKeywords: string[];
  allKeywords: string[];
  minWords?: number;
  disposition: Disposition;
  withDateDisposition?: Disposition;
}

export interface CompiledDialFailureRule {
  anyKeywords: string[];
  disposition: Disposition;
}

export interface DispositionRuleSet {
  shortCallSeconds: number;
  datePatterns: RegExp[];
  rules: CompiledRule[];
  fallback: Disposition;
  dialFailure: CompiledDialFailureRule[];
}

export class DispositionRulesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DispositionRulesError';
  }
}

function lowerAll(values: string[] | undefined): string[] {
  return (values ?? []).map((value) => value.toLowerCase());
}

export function compileDispositionRules(input: unknown): DispositionRuleSet {
  const parsed = DispositionRuleFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new DispositionRulesError(`Invalid disposition rules: ${issues}`);
  }

  const file = parsed.data;
  // sort is stable, so rules sharing a priority keep their file order
  const rules = file.rules
    .map<CompiledRule>((rule) => ({
      name: rule.name,
      priority: rule.priority,
      anyKeywords: lowerAll(rule.anyKeywords),
      allKeywords: lowerAll(rule.allKeywords),
      minWords: rule.minWords,
      disposition: rule.disposition,
      withDateDisposition: rule.withDateDisposition,
    }))
    .sort((a, b) => a.priority - b.priority);

  return {
    shortCallSeconds: file.shortCallSeconds,
    datePatterns: file.datePatterns.map((pattern) => new RegExp(pattern, 'i')),
    rules,
    fallback: file.fallback,
    dialFailure: file.dialFailure.map((rule) => ({
      anyKeywords: lowerAll(rule.anyKeywords),
      disposition: rule.disposition,
    })),
  };
}

export const DEFAULT_RULES_PATH = 'config/disposition-rules.json';

export function loadDispositionRules(filePath: string = DEFAULT_RULES_PATH): DispositionRuleSet {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    throw new DispositionRulesError(
      `Cannot read disposition rules at ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new DispositionRulesError(
      `Disposition rules at ${resolved} are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return compileDispositionRules(json);
}
