import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Conversation } from '../providers/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = join(__dirname, '../../prompts');

const promptCache: Map<string, string> = new Map();

function loadPrompt(name: string): string {
  const cached = promptCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const filePath = join(PROMPTS_DIR, `${name}.md`);
  const content = readFileSync(filePath, 'utf-8').trimEnd();
  promptCache.set(name, content);
  return content;
}

/**
 * Fill `{{NAME}}` placeholders in one pass, so placeholder-looking text
 * inside a value is left alone.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

export function buildQuestionConversation(documentText: string): Conversation {
  return [
    {
      role: 'user',
      content: fillTemplate(loadPrompt('question-user'), { DOCUMENT: documentText }),
    },
  ];
}

export function buildEvaluationConversation(
  documentText: string,
  questionText: string,
  userAnswer: string
): Conversation {
  return [
    { role: 'system', content: loadPrompt('evaluator-system') },
    {
      role: 'user',
      content: fillTemplate(loadPrompt('evaluator-user'), {
        DOCUMENT: documentText,
        QUESTION: questionText,
        ANSWER: userAnswer,
      }),
    },
  ];
}

export function clearPromptCache(): void {
  promptCache.clear();
}
