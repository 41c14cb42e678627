import type { TemplateId } from '../conversation/types.js';

/**
 * Section kinds, least specific last. The composer truncates `closing`
 * first, then `secondary`, then `bullets`, then trailing `body` sentences.
 */
export type SectionKind = 'headline' | 'body' | 'bullets' | 'secondary' | 'closing';

export interface TemplateSection {
  kind: SectionKind;
  /** Lines with `{{name}}` placeholders. A multi-line value repeats its line. */
  lines: readonly string[];
}

export type MessageTemplate = readonly TemplateSection[];

const section = (kind: SectionKind, ...lines: string[]): TemplateSection => ({ kind, lines });

export const TEMPLATES: Readonly<Record<TemplateId, MessageTemplate>> = {
  summary: [
    section('headline', '📊 Résumé fit for {{role}}: {{band_label}}'),
    section(
      'body',
      'I compared your résumé with the job description and my advice library.',
      '{{narrative}}',
      '{{advice_note}}',
    ),
    section('bullets', '✅ Strengths: {{strengths}}', '⚠️ Gaps: {{gaps}}'),
    section('closing', 'Reply with anything to see what we can dig into next.'),
  ],

  topic_menu: [
    section('headline', 'What would you like to dig into for {{role}}?'),
    section(
      'bullets',
      '1. SKILLS: keyword matches and gaps',
      '2. EXPERIENCE: how your achievements read',
      '3. FORMATTING: layout and ATS readiness',
      '4. ALL: a quick tour of everything',
    ),
    section('closing', 'Reply with a number or a word.'),
  ],

  detail_skills: [
    section('headline', '🔑 Skills and keywords'),
    section('body', '{{insight}}'),
    section(
      'bullets',
      'Already on your résumé: {{matched}}',
      'Missing from it: {{missing}}',
      '• {{actions}}',
    ),
    section('secondary', '📖 {{sources}}'),
    section('closing', 'Only add keywords you can back up in an interview.'),
  ],

  detail_experience: [
    section('headline', '🏆 Experience and achievements'),
    section('body', '{{insight}}', 'Lead each bullet with the result, then say how you got there.'),
    section('bullets', '• {{tips}}'),
    section('secondary', '📖 {{sources}}'),
    section('closing', 'Numbers beat adjectives: a percentage, a headcount or a budget.'),
  ],

  detail_formatting: [
    section('headline', '📄 Formatting and ATS'),
    section(
      'body',
      '{{insight}}',
      'Keep to one column with standard section headings so applicant tracking systems can read it.',
    ),
    section('bullets', '• {{tips}}'),
    section('secondary', '📖 {{sources}}'),
    section('closing', 'Save both a plain PDF and a Word copy, since some portals only take one.'),
  ],

  detail_all: [
    section('headline', '🧭 The full picture: {{band_label}}'),
    section('bullets', '✅ Strengths: {{strengths}}', '⚠️ Gaps: {{gaps}}', '• {{tips}}'),
    section('secondary', '📖 {{sources}}'),
    section('closing', 'Each of these has more depth if you ask for it.'),
  ],

  followup_prompt: [
    section('headline', 'Want more?'),
    section('body', 'Reply {{remaining}} to keep going, or DONE to wrap up.'),
  ],

  clarify_choice: [
    section('headline', 'Sorry, I did not catch that.'),
    section('body', 'Reply 1 for SKILLS, 2 for EXPERIENCE, 3 for FORMATTING or 4 for ALL.'),
  ],

  clarify_followup: [
    section('headline', 'Sorry, I did not catch that.'),
    section('body', 'Reply {{remaining}} for more, or DONE to finish.'),
  ],

  closing: [
    section('headline', 'That wraps up your review ({{band_label}}).'),
    section('body', 'Good luck with the application. Text a topic name any time to revisit it.'),
  ],

  completed_reminder: [
    section('body', 'Your review is complete. Reply SKILLS, EXPERIENCE, FORMATTING or ALL to revisit a topic.'),
  ],

  deferred: [
    section('body', "You've reached today's message limit. I'll pick up where we left off in {{resume_after}}."),
  ],

  apology: [
    section('body', 'Sorry, something went wrong on my side. Reply with any message to restart your review.'),
  ],

  help: [
    section('body', "I couldn't find a review for this number. Start one from the résumé fit page, then reply here."),
  ],

  too_long: [
    section('body', 'This section is too long for a text message. Reply ALL for a shorter overview, or DONE to finish.'),
  ],
};
