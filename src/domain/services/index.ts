export {
  ReviewScheduler,
  ReviewPolicy,
  ReviewHistory,
  ReviewSchedule,
  MasteryTier,
  DEFAULT_REVIEW_POLICY,
} from './review-scheduler.service';
