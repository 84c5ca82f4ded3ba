import type { FrameworkAnalysisReport } from '../types/index';

export const sampleReport: FrameworkAnalysisReport = {
  title: 'Expand to a second warehouse',
  summary: 'Lease a small second site and revisit after two quarters.',
  frameworks: [
    {
      name: 'SWOT',
      rationale: 'The choice hinges on internal capacity against market demand.',
      decision: 'Expand with a short lease.',
      insights: [
        { title: 'Strengths', points: ['Stable cash flow', 'Experienced floor staff'] },
        { title: 'Threats', points: ['Seasonal demand swings'] },
      ],
    },
  ],
};
