/**
 * BankGenerator - Asks an LLM for a new insight bank and checks the reply.
 *
 * Each attempt's reply is extracted, validated and normalized. Problems are
 * sent back to the model on the next attempt; after the last failed attempt
 * a GenerationError is thrown. A provider call that throws counts as a failed
 * attempt and is retried with the same messages.
 */

import { GenerationError } from '../core/errors.js';
import { getSanitizer } from '../core/OutputSanitizer.js';
import type { BankNumber, GenerationInfo, NumberInsightBank } from '../core/types.js';
import { extractJsonBlocks } from '../archive/ArchiveParser.js';
import { normalizeBank, type NormalizationChanges } from '../normalize/ContentNormalizer.js';
import { buildBankPrompt, buildRetryMessage, type Persona } from '../prompts/BankPromptTemplate.js';
import type { LLMClient, LLMResponse, Message } from '../providers/types.js';
import { parseBankJson, serializeBank, validateBankDocument } from '../schema/BankSchema.js';
import type { GenerationLogger } from './GenerationLogger.js';

export interface GenerationRequest {
  number: BankNumber;
  theme?: string;
  timeContext?: string;
  batchSize?: number;
  persona?: Persona;
  /** Existing bank used for tone examples */
  examples?: NumberInsightBank;
  /** generation_info.date; defaults to today */
  date?: string;
}

export interface GenerationResult {
  bank: NumberInsightBank;
  attempts: number;
  model: string;
  changes: NormalizationChanges;
}

export interface BankGeneratorOptions {
  client: LLMClient;
  maxAttempts?: number;
  maxTokens?: number;
  temperature?: number;
  logger?: GenerationLogger;
  quiet?: boolean;
  now?: () => Date;
}

/**
 * JSON text from an LLM reply: the first fenced block, else the outermost
 * object. Null when there is neither.
 */
export function extractJsonPayload(text: string): string | null {
  return extractJsonBlocks(text)[0] ?? null;
}

type AttemptOutcome =
  | { ok: true; bank: NumberInsightBank; changes: NormalizationChanges; parsedInfo?: GenerationInfo }
  | { ok: false; problems: string[] };

export class BankGenerator {
  private client: LLMClient;
  private maxAttempts: number;
  private maxTokens: number;
  private temperature: number;
  private logger?: GenerationLogger;
  private quiet: boolean;
  private now: () => Date;

  constructor(options: BankGeneratorOptions) {
    this.client = options.client;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.maxTokens = options.maxTokens ?? 8192;
    this.temperature = options.temperature ?? 0.7;
    this.logger = options.logger;
    this.quiet = options.quiet ?? false;
    this.now = options.now ?? (() => new Date());
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const batchSize = request.batchSize ?? 15;
    const prompt = buildBankPrompt({
      number: request.number,
      theme: request.theme,
      timeContext: request.timeContext,
      batchSize,
      examples: request.examples,
      persona: request.persona
    });

    const messages: Message[] = [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user }
    ];
    let lastProblems: string[] = [];

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (!this.quiet) {
        console.log(`[BankGenerator] Number ${request.number}: attempt ${attempt}/${this.maxAttempts} with ${this.client.model}`);
      }

      let response: LLMResponse;
      try {
        response = await this.client.generate(messages, {
          maxTokens: this.maxTokens,
          temperature: this.temperature
        });
      } catch (error) {
        const sanitizer = getSanitizer();
        const cause = error instanceof Error ? sanitizer.sanitizeError(error).message : sanitizer.sanitize(String(error));
        lastProblems = [`Provider call failed: ${cause}`];
        if (!this.quiet) {
          console.log(`[BankGenerator] Number ${request.number}: ${lastProblems[0]}`);
        }
        this.logger?.logResponse({
          number: request.number,
          attempt,
          model: this.client.model,
          prompt: messages.map(m => m.content).join('\n\n'),
          response: '',
          problems: lastProblems
        });
        continue;
      }

      const outcome = this.checkReply(response.content, request.number);
      const problems = outcome.ok ? [] : outcome.problems;
      if (response.stopReason === 'max_tokens' && !outcome.ok) {
        problems.push('Reply was cut off at the token limit');
      }

      this.logger?.logResponse({
        number: request.number,
        attempt,
        model: response.model,
        prompt: messages.map(m => m.content).join('\n\n'),
        response: response.content,
        problems
      });

      if (outcome.ok) {
        const parsed = outcome.parsedInfo;
        const generationInfo: GenerationInfo = {
          date: request.date ?? this.now().toISOString().slice(0, 10),
          timeContext: request.timeContext ?? parsed?.timeContext,
          theme: request.theme ?? parsed?.theme,
          batchSize,
          model: response.model,
          extra: parsed?.extra ?? {}
        };
        return {
          bank: { ...outcome.bank, generationInfo },
          attempts: attempt,
          model: response.model,
          changes: outcome.changes
        };
      }

      lastProblems = problems;
      messages.push({ role: 'assistant', content: response.content });
      messages.push({ role: 'user', content: buildRetryMessage(problems) });
    }

    throw new GenerationError(request.number, this.maxAttempts, lastProblems.join('; '));
  }

  private checkReply(content: string, number: BankNumber): AttemptOutcome {
    const payload = extractJsonPayload(content);
    if (payload === null) {
      return { ok: false, problems: ['Reply contained no JSON object'] };
    }

    const parsed = parseBankJson(payload, { fallbackNumber: number });
    const errors = parsed.issues.filter(issue => issue.severity === 'error').map(issue => issue.message);
    if (!parsed.valid) {
      return { ok: false, problems: errors.length > 0 ? errors : ['Reply held no bank'] };
    }

    const bank = parsed.banks[0];
    if (parsed.banks.length > 1) {
      return { ok: false, problems: [`Reply held ${parsed.banks.length} banks, expected one`] };
    }
    if (bank.number !== number) {
      return { ok: false, problems: [`Reply was for number ${bank.number}, expected ${number}`] };
    }

    const normalized = normalizeBank(bank);
    const recheck = validateBankDocument(serializeBank(normalized.bank));
    if (!recheck.valid) {
      return {
        ok: false,
        problems: recheck.issues.filter(issue => issue.severity === 'error').map(issue => issue.message)
      };
    }

    return { ok: true, bank: normalized.bank, changes: normalized.changes, parsedInfo: bank.generationInfo };
  }
}
