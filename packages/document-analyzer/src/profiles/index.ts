export { AnalysisProfileError } from './analysis-profile-error';
export { defineAnalysisProfile } from './analysis-profile';
export type {
  AnalysisProfile,
  HolisticFields,
  HolisticListField,
  HolisticTextField,
  UnitNameStyle,
} from './analysis-profile';
export { movieReviewProfile } from './movie-review-profile';
export { resumeProfile } from './resume-profile';
