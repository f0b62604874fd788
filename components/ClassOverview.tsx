import React from 'react';
import type { ProficiencyTier, SkillTierSummary } from '../types';
import { TIERS } from '../constants';
import TierBadge from './TierBadge';

export interface OverviewStudent {
  studentId: string;
  studentName: string;
  results: { skill: string; score: number; tier: ProficiencyTier }[];
}

interface ClassOverviewProps {
  generatedOn: string;
  thresholds: { lowThreshold: number; highThreshold: number };
  summaries: SkillTierSummary[];
  students: OverviewStudent[];
}

const ClassOverview: React.FC<ClassOverviewProps> = ({ generatedOn, thresholds, summaries, students }) => {
  const skills = summaries.map(s => s.skill);

  return (
    <main className="max-w-6xl mx-auto p-6 space-y-6">
      <header>
        <h1 className="text-2xl font-black text-slate-900">Class Proficiency Overview</h1>
        <p className="text-xs text-slate-500">
          {`Generated on ${generatedOn} - Low below ${thresholds.lowThreshold}, High from ${thresholds.highThreshold}`}
        </p>
      </header>

      <section className="bg-white rounded-3xl shadow-sm border border-slate-200 overflow-hidden">
        <table className="w-full text-left text-sm border-collapse">
          <thead>
            <tr className="bg-slate-50 text-slate-500 text-[10px] font-black uppercase tracking-widest">
              <th className="px-6 py-4">Skill</th>
              {TIERS.map(tier => <th key={tier} className="px-6 py-4 text-center">{tier}</th>)}
              <th className="px-6 py-4 text-center">Average</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-100">
            {summaries.map(summary => (
              <tr key={summary.skill}>
                <td className="px-6 py-4 font-black text-slate-900">{summary.skill}</td>
                {TIERS.map(tier => <td key={tier} className="px-6 py-4 text-center">{summary.counts[tier]}</td>)}
                <td className="px-6 py-4 text-center">{summary.averageScore.toFixed(1)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </section>

      <section className="bg-white rounded-3xl shadow-sm border border-slate-200 overflow-hidden">
        <table className="w-full text-left text-sm border-collapse">
          <thead>
            <tr className="bg-slate-50 text-slate-500 text-[10px] font-black uppercase tracking-widest">
              <th className="px-6 py-4">Student</th>
              {skills.map(skill => <th key={skill} className="px-6 py-4">{skill}</th>)}
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-100">
            {students.map(student => (
              <tr key={student.studentId}>
                <td className="px-6 py-4">
                  <div className="font-black text-slate-900">{student.studentName}</div>
                  <div className="text-[10px] font-bold text-slate-400">{student.studentId}</div>
                </td>
                {skills.map(skill => {
                  const result = student.results.find(r => r.skill === skill);
                  return (
                    <td key={skill} className="px-6 py-4">
                      {result ? <TierBadge tier={result.tier} score={result.score} /> : '-'}
                    </td>
                  );
                })}
              </tr>
            ))}
            {students.length === 0 && (
              <tr>
                <td colSpan={skills.length + 1} className="px-6 py-20 text-center text-slate-400 font-black uppercase tracking-widest">No students loaded</td>
              </tr>
            )}
          </tbody>
        </table>
      </section>
    </main>
  );
};

export default ClassOverview;
