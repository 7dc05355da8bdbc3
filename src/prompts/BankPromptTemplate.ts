/**
 * Bank Prompt Template
 *
 * Builds the prompt that asks an LLM for a new insight bank, either as
 * system/user messages for the generator or as a paste-ready markdown
 * template for a chat window.
 */

import { CATEGORY_DESCRIPTIONS, DEFAULT_SOURCE_TEMPLATE, INSIGHT_CATEGORIES } from '../core/constants.js';
import type { BankNumber, NumberInsightBank } from '../core/types.js';
import { numberProfile } from '../numerology/NumerologyCalculator.js';

export const PERSONAS = ['oracle', 'philosopher', 'psychologist', 'mindfulness-coach', 'numerology-scholar'] as const;

export type Persona = (typeof PERSONAS)[number];

const PERSONA_VOICES: Record<Persona, string> = {
  oracle:
    'Speak as The Oracle: poetic and timeless, fond of metaphor, but every image still points to something the reader can do.',
  philosopher:
    'Speak as The Philosopher: measured and reflective, asking good questions and linking old ideas to ordinary days.',
  psychologist:
    'Speak as The Psychologist: warm and professionally compassionate, naming feelings and patterns in accessible language.',
  'mindfulness-coach':
    'Speak as The Mindfulness Coach: calm and instructive, offering simple present-moment practices that take minutes.',
  'numerology-scholar':
    'Speak as The Numerology Scholar: precise about what the number means and how its digits relate, without lecturing.'
};

const DEFAULT_VOICE =
  'Speak with a warm, practical voice that balances depth with accessibility.';

export interface BankPromptOptions {
  number: BankNumber;
  theme?: string;
  timeContext?: string;
  /** Entries per category */
  batchSize?: number;
  /** Existing bank to draw tone examples from */
  examples?: NumberInsightBank;
  persona?: Persona;
}

export interface BankPrompt {
  system: string;
  user: string;
}

export function isPersona(value: string): value is Persona {
  return PERSONAS.some(persona => persona === value);
}

function outputShape(number: number, batchSize: number): string {
  const lines = [
    '{',
    `  "number": ${number},`,
    '  "generation_info": { "date": "YYYY-MM-DD", "time_context": "...", "theme": "...", ' +
      `"batch_size": ${batchSize} },`
  ];
  INSIGHT_CATEGORIES.forEach((category, index) => {
    const comma = index < INSIGHT_CATEGORIES.length - 1 ? ',' : '';
    lines.push(`  "${category}": ["...", "..."]${comma}`);
  });
  lines.push('}');
  return lines.join('\n');
}

export function buildBankPrompt(options: BankPromptOptions): BankPrompt {
  const batchSize = options.batchSize ?? 15;
  const profile = numberProfile(options.number);

  const system = [
    'You write insight banks for a numerology journaling archive.',
    '',
    '## Voice',
    '- Warm, practical and inviting. Prefer softening words such as "you might", "consider" and "perhaps".',
    '- Frame guidance as possibility. Never make absolute claims about health, money, relationships or fate.',
    '- Master numbers (11, 22, 33, 44) are never reduced. Do not write "11 reduces to 2" or "22/4".',
    '- Where a category allows it, include a concrete step with a timeframe ("tonight", "this week").',
    '- Plain language. Do not stack buzzwords such as divine, cosmic or sacred.',
    '- No citations, links or source markers.',
    '',
    '## Persona',
    options.persona ? PERSONA_VOICES[options.persona] : DEFAULT_VOICE,
    '',
    '## Categories',
    `Write exactly ${batchSize} entries for every category. Each entry is one or two sentences, ` +
      'between 20 and 320 characters, and says something different from the others.',
    ...INSIGHT_CATEGORIES.map(category => `- ${category}: ${CATEGORY_DESCRIPTIONS[category]}`),
    '',
    '## Output',
    'Reply with JSON only, no commentary, in exactly this shape:',
    outputShape(options.number, batchSize)
  ].join('\n');

  const user = [
    `Write the insight bank for number ${options.number}: ${profile.archetype} (${profile.theme}).`,
    `Keywords: ${profile.keywords.join(', ')}`,
    `Theme: ${options.theme ?? profile.theme}`,
    `Time context: ${options.timeContext ?? 'any time of day'}`,
    `Entries per category: ${batchSize}`
  ];

  if (options.examples) {
    user.push('', 'Examples from the existing bank, for tone only. Do not repeat them:');
    for (const category of INSIGHT_CATEGORIES) {
      for (const entry of options.examples.categories[category].slice(0, 2)) {
        user.push(`- ${category}: ${JSON.stringify(entry)}`);
      }
    }
  }

  return { system, user: user.join('\n') };
}

/**
 * Follow-up message sent when a reply failed validation.
 */
export function buildRetryMessage(problems: string[]): string {
  return [
    'The previous reply could not be used:',
    ...problems.slice(0, 10).map(problem => `- ${problem}`),
    '',
    'Reply again with the complete JSON object only.'
  ].join('\n');
}

/**
 * Paste-ready markdown for the manual chat workflow.
 */
export function renderPromptTemplate(options: BankPromptOptions): string {
  const prompt = buildBankPrompt(options);
  const fileName = `${DEFAULT_SOURCE_TEMPLATE.replace('{number}', String(options.number))}_original.md`;

  return [
    `# Insight Bank Generation Prompt: Number ${options.number}`,
    '',
    '## Instructions',
    '',
    prompt.system,
    '',
    '## Request',
    '',
    prompt.user,
    '',
    '## Saving the reply',
    '',
    `Save the JSON reply as \`${fileName}\` with a \`# \` title line, a ` +
      `\`## Number ${options.number} Insight Bank\` heading and the JSON in a \`\`\`json fence.`,
    ''
  ].join('\n');
}
