import type { ConversationSession, MessageIntent } from '../conversation/types.js';
import { splitSentences } from '../lib/sentences.js';
import { BAND_LABELS, type ScoreResult } from '../scoring/types.js';
import { TEMPLATES, type MessageTemplate, type SectionKind } from './templates.js';

export const DEFAULT_CHAR_BUDGET = 1600;

const PLACEHOLDER = /\{\{(\w+)\}\}/g;
const URL_PATTERN = /\bhttps?:\/\/\S+|\bwww\.\S+/i;
const SUBSTANTIVE: ReadonlySet<SectionKind> = new Set(['body', 'bullets', 'secondary']);

interface RenderedSection {
  kind: SectionKind;
  lines: string[];
}

function placeholderNames(line: string): string[] {
  return [...line.matchAll(PLACEHOLDER)].map((m) => m[1]);
}

/**
 * Substitutes one template line. The first placeholder with a multi-line
 * value repeats the line once per value line; lines whose placeholders all
 * resolve empty are dropped.
 */
export function expandLine(line: string, variables: Readonly<Record<string, string>>): string[] {
  const names = placeholderNames(line);
  if (names.length === 0) return [line];

  const valueLines = (name: string) =>
    (variables[name] ?? '')
      .split('\n')
      .map((v) => v.trim())
      .filter((v) => v.length > 0);

  if (names.every((name) => valueLines(name).length === 0)) return [];

  const repeating = names.find((name) => valueLines(name).length > 1);
  const substitute = (override?: string) =>
    line
      .replace(PLACEHOLDER, (_, name: string) =>
        name === repeating && override !== undefined ? override : valueLines(name).join(', '),
      )
      .trim();

  if (!repeating) return [substitute()];
  return valueLines(repeating).map((value) => substitute(value));
}

function joinSections(sections: readonly RenderedSection[]): string {
  return sections
    .filter((s) => s.lines.length > 0)
    .map((s) => s.lines.join('\n'))
    .join('\n\n');
}

function hasSubstance(sections: readonly RenderedSection[]): boolean {
  return sections.some((s) => SUBSTANTIVE.has(s.kind) && s.lines.length > 0);
}

/** Drops the last whole sentence of a line; URL-bearing lines go whole. */
function dropLastSentence(line: string): string {
  if (URL_PATTERN.test(line)) return '';
  return splitSentences(line).slice(0, -1).join(' ');
}

/**
 * Renders message intents into channel-ready text within a character
 * budget. Prose comes only from templates; the composer substitutes and
 * trims.
 */
export class MessageComposer {
  private readonly fallback: string;

  constructor(
    readonly budget: number = DEFAULT_CHAR_BUDGET,
    private readonly templates: Readonly<Record<string, MessageTemplate>> = TEMPLATES,
  ) {
    this.fallback = joinSections(this.expand(TEMPLATES.too_long, {}));
    if (this.fallback.length > budget) {
      throw new RangeError(`Character budget ${budget} cannot fit the fallback message`);
    }
  }

  render(intent: MessageIntent, scoreResult: ScoreResult, session: Pick<ConversationSession, 'context'>): string {
    const template = this.templates[intent.template_id];
    if (!template) {
      throw new Error(`Unknown message template: ${intent.template_id}`);
    }
    const variables: Record<string, string> = {
      band_label: BAND_LABELS[scoreResult.band],
      job_title: session.context.job_title ?? '',
      company: session.context.company ?? '',
      ...intent.variables,
    };

    const sections = this.expand(template, variables);
    const full = joinSections(sections);
    if (full.length <= this.budget) return full;

    const truncated = this.truncate(sections);
    return truncated ?? this.fallback;
  }

  /** Plain rendering without score data, for replies outside a session. */
  renderStandalone(intent: MessageIntent): string {
    const template = this.templates[intent.template_id];
    if (!template) {
      throw new Error(`Unknown message template: ${intent.template_id}`);
    }
    const text = joinSections(this.expand(template, intent.variables));
    return text.length <= this.budget ? text : this.fallback;
  }

  private expand(template: MessageTemplate, variables: Readonly<Record<string, string>>): RenderedSection[] {
    return template.map((s) => ({
      kind: s.kind,
      lines: s.lines.flatMap((line) => expandLine(line, variables)),
    }));
  }

  private truncate(sections: RenderedSection[]): string | null {
    const work = sections
      .filter((s) => s.kind !== 'closing')
      .map((s) => ({ kind: s.kind, lines: [...s.lines] }));
    const fits = () => joinSections(work).length <= this.budget;

    for (const kind of ['secondary', 'bullets'] as const) {
      for (const s of work.filter((w) => w.kind === kind).reverse()) {
        while (!fits() && s.lines.length > 0) s.lines.pop();
      }
    }

    for (const s of work.filter((w) => w.kind === 'body').reverse()) {
      while (!fits() && s.lines.length > 0) {
        const last = s.lines.length - 1;
        const shorter = dropLastSentence(s.lines[last]);
        if (shorter) s.lines[last] = shorter;
        else s.lines.pop();
      }
    }

    return fits() && hasSubstance(work) ? joinSections(work) : null;
  }
}
