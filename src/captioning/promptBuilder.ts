import * as path from 'path';
import { AnnotatorConfig, PhaseDefinition, getPhase } from '../config/config';
import { ImageRecord } from '../types/dataset';
import { writeJsonAtomic } from '../storage/jsonStore';
import { logger } from '../utils/logger';

export interface PromptBatchItem {
  index: number;
  image_path: string;
  phase_label: string;
  prompt: string;
}

export function displayName(phase: PhaseDefinition): string {
  return phase.displayName ?? phase.label.charAt(0).toUpperCase() + phase.label.slice(1);
}

/**
 * Fills `{phase}`, `{description}`, `{processStages}`, `{visualMarkers}`,
 * `{growthMin}` and `{growthMax}` in the template. Unknown placeholders are
 * left as they are.
 */
export function buildCaptionPrompt(phase: PhaseDefinition, template: string): string {
  const values: Record<string, string> = {
    phase: displayName(phase),
    description: phase.description,
    processStages: phase.processStages.join(', ') || 'not specified',
    visualMarkers: phase.visualMarkers.join(', ') || 'not specified',
    growthMin: String(phase.growthBand[0]),
    growthMax: String(phase.growthBand[1]),
  };
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function promptFor(cfg: AnnotatorConfig, record: ImageRecord): string {
  const phase = getPhase(cfg, record.phaseLabel);
  if (!phase) {
    throw new Error(`No phase definition for label "${record.phaseLabel}"`);
  }
  return buildCaptionPrompt(phase, cfg.prompt.template);
}

/**
 * Writes the prompt every image would be sent with, without contacting a
 * provider. Returns the path of the written file.
 */
export async function preparePromptBatch(
  cfg: AnnotatorConfig,
  records: readonly ImageRecord[],
  outputPath: string = path.join(cfg.export.outputDir, 'prompts.json')
): Promise<string> {
  const items: PromptBatchItem[] = records.map((record, index) => ({
    index,
    image_path: record.relativePath,
    phase_label: record.phaseLabel,
    prompt: promptFor(cfg, record),
  }));
  await writeJsonAtomic(outputPath, items);
  logger.info(`Prepared ${items.length} prompt(s) in ${outputPath}`);
  return outputPath;
}
