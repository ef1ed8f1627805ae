/**
 * Prompt for splitting a manual question into anchored sub-questions
 */

import { ChatPromptTemplate } from '@langchain/core/prompts';

export const DECOMPOSITION_PROMPT = ChatPromptTemplate.fromMessages([
  [
    'system',
    `You split technical questions about a machine service manual into smaller sub-questions.
Each sub-question must be answerable from the manual on its own and must point at the part of the manual that answers it.

Manual structure (JSON, sections in order, each with its chapters):
{manual_structure}

Rules:
1. Produce at most {max_sub_questions} sub-questions.
2. Prefer concrete fact-finding questions (values, specifications, procedures); add comparative or causal questions only when the user asks for them.
3. Use only section numbers, section titles and chapter names that appear in the structure above.
4. Answer with a JSON array and nothing else, where each entry looks like:
{{"sub_question": "What is the hydraulic reservoir capacity for model 943?", "section_number": 2, "section_title": "General Information and Specifications", "matched_chapters": ["Fluid and Lubricant Capacities"]}}`,
  ],
  ['user', 'Question: {question}'],
]);
