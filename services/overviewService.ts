import { readFileSync } from 'node:fs';
import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { ProficiencyTier, ScoreRecord, SkillTierSummary, ThresholdConfig } from '../types';
import ClassOverview, { type OverviewStudent } from '../components/ClassOverview';
import { classifyScore } from './dataService';

// Utility classes used by components/ClassOverview and TierBadge.
const OVERVIEW_STYLES = readFileSync(new URL('../components/overview.css', import.meta.url), 'utf8');

/**
 * Per-skill tier counts and mean score, skills in order of first appearance.
 */
export function summarizeTiers(records: readonly ScoreRecord[], thresholds: ThresholdConfig): SkillTierSummary[] {
  const bySkill = new Map<string, { counts: Record<ProficiencyTier, number>; total: number; n: number }>();

  records.forEach(record => {
    let entry = bySkill.get(record.skill);
    if (!entry) {
      entry = { counts: { Low: 0, Medium: 0, High: 0 }, total: 0, n: 0 };
      bySkill.set(record.skill, entry);
    }
    entry.counts[classifyScore(record.score, thresholds)]++;
    entry.total += record.score;
    entry.n++;
  });

  return [...bySkill.entries()].map(([skill, entry]) => ({
    skill,
    counts: entry.counts,
    averageScore: Math.round((entry.total / entry.n) * 10) / 10
  }));
}

function groupStudents(records: readonly ScoreRecord[], thresholds: ThresholdConfig): OverviewStudent[] {
  const students = new Map<string, OverviewStudent>();
  records.forEach(record => {
    let student = students.get(record.studentId);
    if (!student) {
      student = { studentId: record.studentId, studentName: record.studentName, results: [] };
      students.set(record.studentId, student);
    }
    student.results.push({ skill: record.skill, score: record.score, tier: classifyScore(record.score, thresholds) });
  });
  return [...students.values()];
}

export function renderClassOverview(
  records: readonly ScoreRecord[],
  thresholds: ThresholdConfig,
  generatedOn: string = new Date().toISOString().split('T')[0]
): string {
  const markup = renderToStaticMarkup(
    React.createElement(ClassOverview, {
      generatedOn,
      thresholds: { lowThreshold: thresholds.lowThreshold, highThreshold: thresholds.highThreshold },
      summaries: summarizeTiers(records, thresholds),
      students: groupStudents(records, thresholds)
    })
  );

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Class Proficiency Overview</title>
<style>
${OVERVIEW_STYLES}</style>
</head>
<body class="bg-slate-50">
${markup}
</body>
</html>
`;
}
