import React from 'react';
import type { ProficiencyTier } from '../types';

interface TierBadgeProps {
  tier: ProficiencyTier;
  score: number;
}

const TIER_COLORS: Record<ProficiencyTier, string> = {
  Low: 'bg-red-100 text-red-700 border-red-200',
  Medium: 'bg-yellow-100 text-yellow-700 border-yellow-200',
  High: 'bg-green-100 text-green-700 border-green-200'
};

const TierBadge: React.FC<TierBadgeProps> = ({ tier, score }) => {
  return (
    <span className={`px-2 py-1 rounded-full text-xs font-semibold border ${TIER_COLORS[tier]}`}>
      {`${tier} (${score})`}
    </span>
  );
};

export default TierBadge;
