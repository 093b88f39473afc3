export {
  Matcher,
  type ClauseFailure,
  type MatchDecision,
  type MatcherOptions,
  type MatchOutcome,
  type MatchResult,
} from "./matcher"
