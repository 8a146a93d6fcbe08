import { AnnotatorConfig, PhaseDefinition, ScoringSettings } from '../config/config';
import { Classification, Criterion, QualityScore } from '../types/dataset';
import { ConfigError, ScoringError } from '../utils/errors';

export interface ScoringContext {
  settings: ScoringSettings;
  phases: readonly PhaseDefinition[];
}

export const CRITERIA: readonly Criterion[] = [
  'phaseMatch',
  'growthPresent',
  'growthInRange',
  'visualDescription',
  'processStage',
  'technicalTerms',
  'length',
  'noContradiction',
];

const GROWTH_PATTERNS = [
  /growth(?:\s+progress)?\s*[:=]?\s*(?:of\s+|about\s+|approx\.?\s+)?~?\s*(-?\d+(?:\.\d+)?)\s*%/i,
  /(-?\d+(?:\.\d+)?)\s*%\s+growth/i,
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive match. */
function containsWord(text: string, word: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(word)}(?![\\p{L}\\p{N}])`, 'iu').test(text);
}

/** Match at a word start, so "seed" also finds "seeds". */
function containsTerm(text: string, term: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}`, 'iu').test(text);
}

function phaseNames(phase: PhaseDefinition): string[] {
  const names = [phase.label, ...phase.synonyms];
  if (phase.displayName) names.push(phase.displayName);
  return names;
}

export function extractGrowth(text: string): number | undefined {
  for (const pattern of GROWTH_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return Number(match[1]);
    }
  }
  return undefined;
}

export function classify(total: number, thresholds: ScoringSettings['thresholds']): Classification {
  if (total >= thresholds.excellent) return 'Excellent';
  if (total >= thresholds.good) return 'Good';
  if (total >= thresholds.acceptable) return 'Acceptable';
  return 'Poor';
}

function emptyBreakdown(): Record<Criterion, number> {
  return {
    phaseMatch: 0,
    growthPresent: 0,
    growthInRange: 0,
    visualDescription: 0,
    processStage: 0,
    technicalTerms: 0,
    length: 0,
    noContradiction: 0,
  };
}

function assertParseable(text: string): void {
  if (!text.trim()) {
    throw new ScoringError('Caption is empty');
  }
  if (!/\p{L}/u.test(text)) {
    throw new ScoringError('Caption contains no words');
  }
}

/**
 * Scores a caption against the phase it was generated for. Pure: the same
 * text, label and context always produce an equal result.
 */
export function scoreCaption(text: string, phaseLabel: string, context: ScoringContext): QualityScore {
  const { settings, phases } = context;
  const phase = phases.find(p => p.label === phaseLabel);
  if (!phase) {
    throw new ConfigError(`Unknown phase label "${phaseLabel}"`);
  }

  try {
    assertParseable(text);
  } catch (error) {
    if (!(error instanceof ScoringError)) throw error;
    return {
      phaseMatch: false,
      growthValue: null,
      growthInRange: false,
      growthOutOfBounds: false,
      criteriaBreakdown: emptyBreakdown(),
      total: 0,
      classification: 'Poor',
      parseError: error.message,
    };
  }

  const { weights } = settings;
  const caption = text.trim();
  const breakdown = emptyBreakdown();

  const phaseMatch = phaseNames(phase).some(name => containsWord(caption, name));
  if (phaseMatch) breakdown.phaseMatch = weights.phaseMatch;

  const extracted = extractGrowth(caption);
  const growthOutOfBounds = extracted !== undefined && (extracted < 0 || extracted > 100);
  const growthValue = extracted !== undefined && !growthOutOfBounds ? extracted : null;
  const [bandMin, bandMax] = phase.growthBand;
  const growthInRange = growthValue !== null && growthValue >= bandMin && growthValue <= bandMax;
  if (growthValue !== null) breakdown.growthPresent = weights.growthPresent;
  if (growthInRange) breakdown.growthInRange = weights.growthInRange;

  if (phase.visualTerms.some(term => containsTerm(caption, term))) {
    breakdown.visualDescription = weights.visualDescription;
  }

  const stageTerms = [...settings.processStageTerms, ...phase.processStages];
  if (stageTerms.some(term => containsTerm(caption, term))) {
    breakdown.processStage = weights.processStage;
  }

  if (settings.technicalTerms.some(term => containsTerm(caption, term))) {
    breakdown.technicalTerms = weights.technicalTerms;
  }

  if (caption.length >= settings.length.min && caption.length <= settings.length.max) {
    breakdown.length = weights.length;
  }

  const otherPhaseNames = phases
    .filter(other => other.label !== phase.label)
    .flatMap(other => (other.displayName ? [other.label, other.displayName] : [other.label]));
  const contradicted =
    phase.contradictoryTerms.some(term => containsTerm(caption, term)) ||
    otherPhaseNames.some(name => containsWord(caption, name));
  if (!contradicted) breakdown.noContradiction = weights.noContradiction;

  const total = CRITERIA.reduce((sum, criterion) => sum + breakdown[criterion], 0);

  return {
    phaseMatch,
    growthValue,
    growthInRange,
    growthOutOfBounds,
    criteriaBreakdown: breakdown,
    total,
    classification: classify(total, settings.thresholds),
  };
}

/** Binds the scorer to a loaded configuration. */
export function createScorer(cfg: AnnotatorConfig): (text: string, phaseLabel: string) => QualityScore {
  const context: ScoringContext = { settings: cfg.scoring, phases: cfg.dataset.phases };
  return (text, phaseLabel) => scoreCaption(text, phaseLabel, context);
}
