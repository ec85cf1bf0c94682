import { defineAnalysisProfile } from './analysis-profile';

export const resumeProfile = defineAnalysisProfile({
  id: 'resume',
  documentLabel: 'resume',
  unitLabel: 'section',
  minWords: 50,
  unitNameStyle: 'verbatim',
  instructions: {
    identification:
      'Identify the key sections of the resume text. Return their names as a comma-separated list.',
    evaluation:
      'Analyze the given resume section for clarity, relevance, and impact. Give critical feedback and a score from 1 to 10.',
    holistic:
      'Assess the resume as a whole: summarize it, then name its key strengths, its weaknesses and actionable improvements.',
  },
  evaluationScoreRange: { min: 1, max: 10 },
  holistic: {
    summaryDescription: 'Short overall assessment of the resume',
    lists: [
      {
        key: 'strengths',
        description: 'Key strengths of the resume',
        delimiter: ';',
      },
      {
        key: 'weaknesses',
        description: 'Weaknesses or gaps in the resume',
        delimiter: ';',
      },
      {
        key: 'recommendations',
        description: 'Actionable improvement suggestions',
        delimiter: ';',
      },
    ],
    narratives: [],
    qualities: [],
  },
});
