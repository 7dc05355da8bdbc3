/**
 * Insight Bank Constants
 *
 * Numbers and categories every insight bank is keyed by.
 */

/**
 * Numbers an insight bank may be written for: the single digits plus the
 * master numbers.
 */
export const BANK_NUMBERS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 11, 22, 33, 44] as const;

export const MASTER_NUMBERS = [11, 22, 33, 44] as const;

/**
 * Master numbers that digit reduction stops at. 44 is kept as a bank key but
 * the calculations reduce it like any other sum.
 */
export const REDUCTION_MASTERS = [11, 22, 33] as const;

/**
 * The twelve categories of a bank, in canonical order.
 */
export const INSIGHT_CATEGORIES = [
  'insight',
  'reflection',
  'contemplation',
  'manifestation',
  'challenge',
  'physical_practice',
  'shadow',
  'archetype',
  'energy_check',
  'numerical_context',
  'astrological_context',
  'mental_wellness'
] as const;

/**
 * Alternate category keys seen in older or hand-converted banks.
 */
export const CATEGORY_ALIASES: Readonly<Record<string, (typeof INSIGHT_CATEGORIES)[number]>> = {
  astrological: 'astrological_context',
  physicalPractice: 'physical_practice',
  energyCheck: 'energy_check',
  numericalContext: 'numerical_context',
  astrologicalContext: 'astrological_context',
  mentalWellness: 'mental_wellness'
};

/**
 * Short descriptions used when prompting for new content.
 */
export const CATEGORY_DESCRIPTIONS: Readonly<Record<(typeof INSIGHT_CATEGORIES)[number], string>> = {
  insight: 'a direct observation about how this number shows up in daily life',
  reflection: 'a question or prompt that invites honest self-examination',
  contemplation: 'a slower, open-ended thought to sit with for a while',
  manifestation: 'a grounded intention or first step toward something wanted',
  challenge: 'a tension or growth edge this number tends to meet',
  physical_practice: 'a short bodily practice: breath, posture, movement or rest',
  shadow: 'the less comfortable side of the number, named without judgement',
  archetype: 'the character or role this number plays, described in plain words',
  energy_check: 'a quick check-in on current energy and what it needs',
  numerical_context: 'how the number relates to its digits, sums or neighbours',
  astrological_context: 'a light connection to planets, signs or lunar timing',
  mental_wellness: 'supportive, non-clinical guidance for a steadier mind'
};

export const DEFAULT_SOURCE_TEMPLATE = 'NumberMessages_Complete_{number}';

export const SOURCE_TIERS = ['original', 'advanced', 'multiplied'] as const;
