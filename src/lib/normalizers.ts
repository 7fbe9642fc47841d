import path from 'path';
import { z } from 'zod';
import {
  ANALYSIS_ERROR_ARTIST,
  ANALYSIS_ERROR_NAME,
  MAX_LISTED_TRACKS,
  SALES_POST_MAX_LENGTH,
  VINYL_STATUSES
} from './constants';
import { formatPrice } from './sheetRows';
import type { VinylAnalysis, VinylRecord } from './types';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value).trim() || undefined));

const VinylAnalysisSchema = z.object({
  name: z.string().trim().min(1),
  artist: z.string().trim().min(1),
  year: optionalText,
  tracklist: z
    .array(z.string())
    .nullish()
    .transform((tracks) => (tracks ?? []).map((track) => track.trim()).filter((track) => track.length > 0)),
  label: optionalText,
  condition: optionalText,
  notes: optionalText
});

export const SALES_POST_INTRO_PREFIXES = [
  'Aqui está uma sugestão de post para o Instagram:',
  'Aqui está o post para o Instagram:',
  'Aqui está uma proposta de post para o Instagram:',
  'Sugestão de post:',
  'Post para Instagram:',
  '---'
];

const CODE_FENCE = /```[a-zA-Z]*\s*([\s\S]*?)```/;

export function extractJsonPayload(text: string): string {
  const fenced = text.match(CODE_FENCE);
  return (fenced ? fenced[1] : text).trim();
}

export function parseVinylAnalysis(text: string): VinylAnalysis {
  const payload: unknown = JSON.parse(extractJsonPayload(text));
  const parsed = VinylAnalysisSchema.parse(payload);
  return {
    name: parsed.name,
    artist: parsed.artist,
    year: parsed.year,
    tracklist: parsed.tracklist,
    label: parsed.label,
    condition: parsed.condition ?? 'A verificar',
    notes: parsed.notes
  };
}

export function formatDescription(analysis: VinylAnalysis): string {
  const parts: string[] = [];

  if (analysis.label) {
    parts.push(`Gravadora: ${analysis.label}`);
  }

  if (analysis.tracklist.length > 0) {
    const tracks = analysis.tracklist
      .slice(0, MAX_LISTED_TRACKS)
      .map((track) => `• ${track}`)
      .join('\n');
    parts.push(`Principais faixas:\n${tracks}`);
  }

  if (analysis.notes) {
    parts.push(`Observações: ${analysis.notes}`);
  }

  return parts.join('\n\n');
}

export function analysisToRecord(analysis: VinylAnalysis, frontImagePath: string, backImagePath?: string): VinylRecord {
  return {
    name: analysis.name,
    artist: analysis.artist,
    year: analysis.year,
    condition: analysis.condition,
    description: formatDescription(analysis) || undefined,
    status: VINYL_STATUSES.PENDING,
    frontImagePath,
    backImagePath
  };
}

export function buildReviewPlaceholder(error: unknown, frontImagePath: string, backImagePath?: string): VinylRecord {
  const reason = error instanceof Error ? error.message : String(error);
  return {
    name: `${ANALYSIS_ERROR_NAME} ${path.basename(frontImagePath)}`,
    artist: ANALYSIS_ERROR_ARTIST,
    description: `Erro ao analisar: ${reason}`,
    condition: 'A verificar',
    status: VINYL_STATUSES.PENDING,
    frontImagePath,
    backImagePath,
    needsReview: true
  };
}

function stripIntroPrefixes(text: string): string {
  let result = text.trim();
  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const prefix of SALES_POST_INTRO_PREFIXES) {
      if (result.startsWith(prefix)) {
        result = result.slice(prefix.length).trim();
        stripped = true;
      }
    }
  }
  return result;
}

export function cleanSalesPost(text: string): string {
  const withoutSeparators = stripIntroPrefixes(text)
    .split('\n')
    .filter((line) => line.trim() !== '---')
    .join('\n')
    .trim();

  const codePoints = Array.from(withoutSeparators);
  if (codePoints.length > SALES_POST_MAX_LENGTH) {
    return `${codePoints.slice(0, SALES_POST_MAX_LENGTH - 3).join('')}...`;
  }
  return withoutSeparators;
}

export function buildFallbackPost(record: VinylRecord): string {
  const lines = [
    `🎵 ${record.name} - ${record.artist} 🎵`,
    '',
    `💿 Disco em ${record.condition ?? 'ótima condição'}`
  ];
  if (record.year) {
    lines.push(`📅 Ano: ${record.year}`);
  }
  lines.push(record.price === undefined ? '💰 Preço especial' : `💰 ${formatPrice(record.price)}`);
  lines.push('', '📩 Interessado? Chama no direct!', '', '#vinil #discosdevinil #vinilbrasil #colecionadores #música');
  return lines.join('\n');
}
