/**
 * @file Turns the engine's structured prompt context into model prompts.
 *
 * The engine only hands over scores, phase and reason strings; all prose
 * addressed to the model is written here.
 */

import type { Message, Phase, RiskScores } from '../scoring_service/models';

export interface PromptContext {
  profile: {
    displayName: string;
    hobbies: string[];
    likes: string[];
    goals: string[];
  };
  phase: Phase;
  scores: RiskScores;
  chaos: { score: number; reason: string };
  emotion: { label: string; severity: number; summary: string };
  session: {
    topics: string[];
    trajectory: string;
    immediateNeeds: string[];
  };
  reasons: { stress: string; burnout: string; danger: string };
  /** Heuristic SHORT-TERM / LONG-TERM outlook */
  predictiveAnalysis: string;
  retractionActive: boolean;
  suggestions: Array<{ title: string; reason: string }>;
}

const ASSISTANT_NAME = 'Steady';

/**
 * System instructions for the reply, built from the context bundle.
 */
export function renderSystemPrompt(context: PromptContext): string {
  const suggestionText = context.suggestions.length > 0
    ? 'Relevant suggestions you might mention if appropriate:\n' +
      context.suggestions.map(s => `- ${s.title} (${s.reason})`).join('\n')
    : '';

  return `
You are ${ASSISTANT_NAME}, a supportive companion. Your goal is to help ${context.profile.displayName} navigate their emotions and understand their mental state.
You are NOT a therapist. You are a friendly, non-judgmental listener and guide.

User Profile:
- Name: ${context.profile.displayName}
- Hobbies: ${context.profile.hobbies.join(', ')}
- Likes: ${context.profile.likes.join(', ')}
- Goals: ${context.profile.goals.join(', ')}

Current Status:
- Phase: ${context.phase}
- Current Emotion: ${context.emotion.summary} (Severity: ${context.emotion.severity}/10)
- Stress Level: ${context.scores.stress}/100 (${context.reasons.stress})
- Burnout Level: ${context.scores.burnout}/100 (${context.reasons.burnout})
- Conversation Stability: ${context.chaos.reason}

Predictive Analysis:
${context.predictiveAnalysis}

${suggestionText}

Current Session Context:
- Topics: ${context.session.topics.join(', ') || 'none yet'}
- Trajectory: ${context.session.trajectory}
- Immediate Needs: ${context.session.immediateNeeds.join(', ')}

Guidelines:
1. Be empathetic and validating. Acknowledge their feelings first.
2. Use their hobbies or likes for metaphors or connections if it fits.
3. In the two most serious phases, be extra gentle and prioritise safety and comfort.
4. You may describe what you observe ("your stress seems to have been rising"), but never name internal phases or call yourself a system. Mention likely consequences from the predictive analysis only gently and only when it helps.
5. Keep responses to 2-3 sentences unless a deeper explanation is needed.
6. Speak like a caring friend, not a machine.
7. If suggestions are listed above, you may gently offer ONE as an option.
8. Serious topics (drugs, self-harm, illegal acts): do not validate happiness that comes from harm, shift to a concerned tone, and always point to professional help, a hotline or a trusted person.
9. Joke retraction: ${context.retractionActive ? 'ACTIVE' : 'INACTIVE'}
   - If ACTIVE the user just said an alarming statement was a joke. Express relief, stay firm that such statements are taken seriously, and do not scold.
`.trim();
}

/**
 * Full reply prompt: system instructions, recent history and the new message.
 */
export function renderReplyPrompt(context: PromptContext, history: readonly Message[], lastMessage: string): string {
  const conversation = history
    .map(turn => `${turn.sender === 'user' ? 'User' : ASSISTANT_NAME}: ${turn.text}`)
    .join('\n');

  return `${renderSystemPrompt(context)}

Conversation History:
${conversation}
User: ${lastMessage}
${ASSISTANT_NAME}:`;
}

/**
 * Emotion analysis prompt; the model must answer with JSON only.
 */
export function renderEmotionPrompt(text: string): string {
  return `Analyze the following text for emotional content and return a JSON response with these exact fields:

Text to analyze: "${text.replace(/"/g, '\\"')}"

Return ONLY a valid JSON object with this structure (no markdown, no extra text):
{
  "emotion_tags": ["list", "of", "emotion", "keywords"],
  "severity": 0.0,
  "stability": 0.0,
  "summary": "brief summary of emotional state"
}

Guidelines:
- emotion_tags: primary emotions (e.g. "anxious", "happy", "stressed", "sad", "angry", "suicidal", "self-harm", "hopeful")
- severity: 0-10 (0 = neutral, 10 = extreme crisis)
- stability: 0-10 (0 = very unstable, 10 = very stable)
- summary: one sentence describing the overall emotional state`;
}

/**
 * Suggestion prompt for phases below CRISIS.
 */
export function renderSuggestionPrompt(
  context: PromptContext,
  count: number,
  preferences: { category: string | null; difficulty: string | null }
): string {
  const preferenceLines = [
    preferences.category ? `- User prefers '${preferences.category}' activities.` : '',
    preferences.difficulty ? `- User prefers '${preferences.difficulty}' difficulty tasks.` : '',
  ].filter(Boolean).join('\n');

  return `Generate ${count} gentle, supportive and actionable suggestions for a user in the '${context.phase}' phase.

Context:
- Hobbies: ${context.profile.hobbies.slice(0, 3).join(', ')}
- Goals: ${context.profile.goals.slice(0, 2).join(', ')}
- Topics: ${context.session.topics.join(', ')}
- Stress: ${context.scores.stress}/100, Burnout: ${context.scores.burnout}/100, Danger: ${context.scores.danger}/100

User Preferences:
${preferenceLines || '- none recorded'}

Rules:
1. Address the specific situations the user mentioned, not only generic self-care.
2. Suggestions must be safe, non-judgmental and optional. No medical or legal advice.
3. Return a JSON list of objects with keys: title, reason, permission_prompt, difficulty, category, tied_to.
4. difficulty: very_easy, easy, medium or hard. category: comfort, creative, physical, social or reflective.
5. tied_to: stress, burnout, danger, chaos or profile.
6. title under 280 characters, reason under 180 characters.

Return ONLY valid JSON.`;
}

/**
 * Strip markdown code fences a model may wrap JSON in.
 */
export function stripCodeFences(response: string): string {
  let cleaned = response.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}
