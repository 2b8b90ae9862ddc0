import { GenerationRequest, StageRequest } from '../../types';
import { parseCharacter } from '../../domain/common/schemas';

export interface PromptLimits {
  outlineMaxTokens: number;
  episodeMaxTokens: number;
}

/** Characters of the previous episode carried into the next prompt. */
export const CONTINUITY_WINDOW = 1500;

/** Fallback length when no outline structure can be found. */
const OUTLINE_FALLBACK_CHARS = 5000;

/** How far past the directory heading episode lines are collected. */
const DIRECTORY_SCAN_CHARS = 2000;

/**
 * Pull the title, cast table and episode directory out of outline text.
 * Falls back to the head of the outline when none of them is found.
 */
export function summarizeOutline(outline: string): string {
  const parts: string[] = [];

  const title = /^\s*(?:#+\s*)?Title:\s*(.+)$/im.exec(outline.slice(0, 1000));
  if (title) {
    parts.push(`Title: ${title[1].trim()}`);
  }

  const tableLines: string[] = [];
  for (const line of outline.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('|')) {
      tableLines.push(trimmed);
    } else if (tableLines.length > 0) {
      break;
    }
  }
  if (tableLines.length > 0) {
    parts.push(`[Cast]\n${tableLines.join('\n')}`);
  }

  const directoryStart = outline.search(/episode (?:directory|list)/i);
  if (directoryStart !== -1) {
    const section = outline.slice(directoryStart, directoryStart + DIRECTORY_SCAN_CHARS);
    const episodeLines = section
      .split('\n')
      .map(l => l.trim())
      .filter(l => /^(?:[-*]\s*)?Episode\s+\d+/i.test(l));
    if (episodeLines.length > 0) {
      parts.push(`[Episode directory]\n${episodeLines.join('\n')}`);
    }
  }

  if (parts.length === 0) {
    return outline.slice(0, OUTLINE_FALLBACK_CHARS);
  }
  return parts.join('\n\n');
}

function castList(request: GenerationRequest): string {
  return request.characters
    .map(parseCharacter)
    .map(c => `- ${c.name} (${c.gender}, ${c.age})`)
    .join('\n');
}

/**
 * Builds the generator request for each stage. Stage 0 is the cast and
 * outline; stage e is episode e.
 */
export class StagePromptBuilder {
  constructor(private limits: PromptLimits) {}

  build(taskId: string, stage: number, request: GenerationRequest, stageOutputs: Record<string, string>): StageRequest {
    if (stage === 0) {
      return {
        taskId,
        stage,
        kind: 'outline',
        prompt: this.outlinePrompt(request),
        maxTokens: this.limits.outlineMaxTokens
      };
    }
    return {
      taskId,
      stage,
      kind: 'episode',
      prompt: this.episodePrompt(stage, request, stageOutputs),
      maxTokens: this.limits.episodeMaxTokens
    };
  }

  private outlinePrompt(request: GenerationRequest): string {
    return [
      `You are a writer of short-form ${request.genre} drama series.`,
      '',
      'Write the following for a new series:',
      '1. A line "Title: <series title>".',
      '2. A cast table in markdown with the columns',
      '   | Name | Role | Appearance | Personality | Goal | Conflict |',
      `3. An "Episode directory" listing episodes 1 to ${request.episodes},`,
      '   one line each, formatted "Episode N: <one-line hook>".',
      '',
      `Genre: ${request.genre}`,
      `Episodes: ${request.episodes}`,
      `Minutes per episode: ${request.duration}`,
      '',
      'Every one of these characters must appear in the series:',
      castList(request),
      '',
      'Give every episode a clear conflict or payoff. Do not write episode scripts yet.'
    ].join('\n');
  }

  private episodePrompt(episode: number, request: GenerationRequest, stageOutputs: Record<string, string>): string {
    const outline = stageOutputs['0'] ?? '';
    const previous = stageOutputs[String(episode - 1)];

    const lines = [
      `You are a writer of short-form ${request.genre} drama series.`,
      '',
      `Write the complete script of episode ${episode} of ${request.episodes}.`,
      `Each episode runs about ${request.duration} minutes.`,
      '',
      '[Series outline]',
      summarizeOutline(outline)
    ];

    if (episode > 1 && previous) {
      lines.push(
        '',
        `[End of episode ${episode - 1}]`,
        previous.slice(-CONTINUITY_WINDOW),
        '',
        'Open where the previous episode ended.'
      );
    }

    lines.push(
      '',
      'Format:',
      `Start with "Episode ${episode}", then scenes numbered "Scene ${episode}-1", "Scene ${episode}-2" and so on.`,
      'Each scene gives a location and time line, then action and dialogue.',
      'Open on the core conflict and end on a hook for the next episode.',
      'Write only this episode.'
    );

    return lines.join('\n');
  }
}
