import type { ComposedPrompt, GenerationRequest } from '../types';
import {
  GENERIC_SKILL_INSTRUCTION,
  MAX_CURRICULUM_GRADE,
  MIN_CURRICULUM_GRADE,
  SKILL_INSTRUCTION_RULES,
  TIER_LABELS,
  WORD_BANDS
} from '../constants';

export const ROLE_INSTRUCTION = `You are an educational content generator for primary school English, grades ${MIN_CURRICULUM_GRADE}-${MAX_CURRICULUM_GRADE}.
Write every worksheet at the TARGET curriculum grade you are given, not at the student's actual grade.
Keep vocabulary, topics and sentence length age-appropriate for that target grade, and keep all content safe and encouraging for young learners.`;

/**
 * First matching rule wins, in the order of SKILL_INSTRUCTION_RULES. A skill
 * such as "Reading Grammar" therefore gets the grammar instruction.
 */
export function selectSkillInstruction(skill: string): string {
  const lower = skill.toLowerCase();
  const rule = SKILL_INSTRUCTION_RULES.find(r => r.keywords.some(keyword => lower.includes(keyword)));
  return rule ? rule.instruction : GENERIC_SKILL_INSTRUCTION;
}

export function wordBandForGrade(grade: number): { min: number; max: number } {
  const band = WORD_BANDS.find(b => grade <= b.maxGrade) ?? WORD_BANDS[WORD_BANDS.length - 1];
  return { min: band.min, max: band.max };
}

function outputTemplate(questionCount: number): string {
  const lines = ['PASSAGE:', '<reading passage>', '', 'QUESTIONS:'];
  for (let n = 1; n <= questionCount; n++) {
    lines.push(`${n}) <question>`, 'A) <option>', 'B) <option>', 'C) <option>', 'D) <option>');
  }
  lines.push('', 'ANSWER KEY:');
  for (let n = 1; n <= questionCount; n++) {
    lines.push(`${n}) <letter>`);
  }
  return lines.join('\n');
}

export function composePrompt(request: GenerationRequest): ComposedPrompt {
  const band = wordBandForGrade(request.targetGrade);

  const referenceSection = request.retrievalContext.length > 0
    ? `\nUse the following curriculum reference material to align the topic, vocabulary and question focus:\n${request.retrievalContext.join('\n')}\n`
    : '';

  const taskInstruction = `Create a personalised practice worksheet.

Student: ${request.studentName}
Actual grade: ${request.actualGrade}
Target curriculum grade: ${request.targetGrade}
Skill: ${request.skill}
Performance level: ${TIER_LABELS[request.tier]}

Skill guidance: ${request.skillInstruction}
${referenceSection}
Tasks:
1. Write a short reading passage of ${band.min}-${band.max} words suitable for grade ${request.targetGrade}.
2. Make sure the passage and the questions practise the skill "${request.skill}".
3. Write exactly ${request.questionCount} multiple-choice questions, each with four options A-D and one correct answer.
4. Provide an answer key.

Use exactly this output format, with these section headings and nothing before PASSAGE:

${outputTemplate(request.questionCount)}`;

  return { roleInstruction: ROLE_INSTRUCTION, taskInstruction };
}
