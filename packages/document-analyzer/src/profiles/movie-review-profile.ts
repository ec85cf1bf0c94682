import { defineAnalysisProfile } from './analysis-profile';

export const movieReviewProfile = defineAnalysisProfile({
  id: 'movie-review',
  documentLabel: 'movie review',
  unitLabel: 'genre',
  minWords: 1,
  unitNameStyle: 'title-case',
  instructions: {
    identification:
      'Identify the genres of the movie. Return them as a comma-separated list.',
    evaluation:
      'Evaluate how well the movie delivers on the given genre. Explain your reasoning and give a score from 0 to 10.',
    holistic:
      'Review the movie as a whole: its plot, characters, craft and cultural relevance, with an overall rating and related recommendations.',
  },
  evaluationScoreRange: { min: 0, max: 10 },
  holistic: {
    summaryDescription: 'Concise plot summary without major spoilers',
    lists: [
      {
        key: 'similarMovies',
        description: 'Titles of similar movies',
        delimiter: ',',
      },
      {
        key: 'recommendations',
        description: 'Audiences or occasions this movie suits',
        delimiter: ',',
      },
    ],
    narratives: [
      {
        key: 'characterAnalysis',
        description: 'Analysis of the main characters and their development',
      },
      {
        key: 'culturalImpact',
        description: 'Cultural relevance and influence of the movie',
      },
    ],
    qualities: [
      { key: 'directing', description: 'Quality of the direction' },
      { key: 'cinematography', description: 'Quality of the cinematography' },
      {
        key: 'technicalAspects',
        description: 'Quality of sound, editing and effects',
      },
    ],
    rating: {
      key: 'rating',
      description: 'Overall rating of the movie',
      range: { min: 0, max: 10 },
    },
  },
});
