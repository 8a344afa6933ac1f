export {
  scoreQuality, clampScore, charLength,
  detectObviousImprovement, detectDeterioration,
  REFINED_WEIGHTS, IMPORTANT_KEYWORDS,
} from './scorer.js';
