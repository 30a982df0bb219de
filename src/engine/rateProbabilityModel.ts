/**
 * BoJ policy-rate probability model (OIS-implied)
 *
 * Purpose:
 * - Infers the market-implied probability that the policy rate moves by a known step at the next
 *   scheduled meeting, from two points on the OIS curve that straddle the meeting.
 *
 * Exports:
 * - `impliedPostMeetingRate(...)`: solves the blended-rate identity for E[r] after the meeting.
 * - `impliedStepProbability(...)`: turns E[r] into a clipped step probability.
 * - `clipProbability(p)`: clamps a raw value into [0, 1] and reports which boundary was hit.
 * - `computeRateProbabilities(...)`: picks r_pre / r_post off a curve and reports hike, cut and
 *   no-change probabilities.
 *
 * Side effects: none. Every function is pure and synchronous.
 *
 * Errors:
 * - `InvalidTenorError` when the post-meeting tenor does not extend past the meeting (D_post <= 0).
 * - `InvalidStepSizeError` when a step size is zero, non-finite, or has the wrong sign.
 * - Out-of-range probabilities are NOT errors: they are clipped and flagged via `BoundaryHit`.
 */
import { BoundaryHit } from '../domain/enums';
import { InvalidStepSizeError, InvalidTenorError } from '../domain/errors';
import { OISQuote, PolicyMeeting } from '../domain/market';
import { ClippedProbability, NoChangeConsistency, PolicyStepSizes, RateProbabilityResult } from '../domain/rates';

export interface ImpliedRateInputs {
  rPre: number;
  rPost: number;
  dPre: number;
  dPost: number;
}

export interface RateModelOptions {
  overnightTenorDays: number;
  consistencyTolerance: number;
}

const DEFAULT_OPTIONS: RateModelOptions = {
  overnightTenorDays: 1,
  consistencyTolerance: 0.05,
};

/**
 * Purpose: Clamp a raw probability into [0, 1].
 * Returns: `ClippedProbability` carrying the raw value, the clipped value, and which boundary (if any) was hit.
 * Errors: none. A NaN input is reported as a floor hit with value 0.
 */
export const clipProbability = (raw: number): ClippedProbability => {
  if (Number.isNaN(raw) || raw < 0) return { raw, value: 0, boundary: BoundaryHit.Floor };
  if (raw > 1) return { raw, value: 1, boundary: BoundaryHit.Cap };
  return { raw, value: raw, boundary: BoundaryHit.None };
};

/**
 * Purpose: Expected overnight rate after the meeting, E[r].
 * Parameters:
 * - `rPre`: overnight rate before the meeting (decimal).
 * - `rPost`: OIS rate for the tenor ending `dPre + dPost` days out.
 * - `dPre`: days until the meeting.
 * - `dPost`: days from the meeting to the end of the `rPost` tenor.
 * Returns: `number`, from `rPost = (rPre*dPre + E[r]*dPost) / (dPre + dPost)` solved for E[r].
 * Errors: throws `InvalidTenorError` if `dPost <= 0` (the identity divides by `dPost`).
 */
export const impliedPostMeetingRate = ({ rPre, rPost, dPre, dPost }: ImpliedRateInputs): number => {
  if (!Number.isFinite(dPost) || dPost <= 0) {
    throw new InvalidTenorError(`Post-meeting tenor must extend past the meeting (D_post=${dPost})`, { dPre, dPost });
  }
  if (!Number.isFinite(dPre) || dPre < 0) {
    throw new InvalidTenorError(`Days to meeting must be non-negative (D_pre=${dPre})`, { dPre, dPost });
  }
  return (rPost * (dPre + dPost) - rPre * dPre) / dPost;
};

const assertStep = (step: number, label: string): void => {
  if (!Number.isFinite(step) || step === 0) {
    throw new InvalidStepSizeError(`Policy step size must be non-zero and finite (${label}=${step})`, { [label]: step });
  }
};

/**
 * Purpose: Probability that the policy rate moves by `step` at the meeting.
 * Parameters: the four OIS inputs plus `step` (signed; +0.0025 for a 25bp hike, -0.0025 for a cut).
 * Returns: `ClippedProbability` where `raw = (E[r] - rPre) / step`.
 * Errors: `InvalidTenorError` (see `impliedPostMeetingRate`), `InvalidStepSizeError` if `step` is 0.
 */
export const impliedStepProbability = (inputs: ImpliedRateInputs, step: number): ClippedProbability => {
  assertStep(step, 'step');
  const expected = impliedPostMeetingRate(inputs);
  return clipProbability((expected - inputs.rPre) / step);
};

/**
 * Purpose: Pick `rPre` off the curve: the overnight quote if there is one, else the shortest tenor.
 * Errors: throws `InvalidTenorError` on an empty curve.
 */
const currentRateQuote = (quotes: OISQuote[], overnightTenorDays: number): OISQuote => {
  if (quotes.length === 0) throw new InvalidTenorError('OIS curve has no quotes');
  const overnight = quotes.find((q) => q.tenorDays === overnightTenorDays);
  if (overnight) return overnight;
  return quotes.reduce((shortest, q) => (q.tenorDays < shortest.tenorDays ? q : shortest));
};

/**
 * Purpose: Pick `rPost` off the curve: the shortest tenor that ends strictly after the meeting.
 * Errors: throws `InvalidTenorError` if no tenor reaches past the meeting.
 */
const postMeetingQuote = (quotes: OISQuote[], daysToMeeting: number): OISQuote => {
  const candidates = quotes.filter((q) => q.tenorDays > daysToMeeting);
  if (candidates.length === 0) {
    throw new InvalidTenorError(`No OIS tenor extends past the meeting ${daysToMeeting} days out`, {
      daysToMeeting,
      longestTenorDays: quotes.reduce((max, q) => Math.max(max, q.tenorDays), 0),
    });
  }
  return candidates.reduce((shortest, q) => (q.tenorDays < shortest.tenorDays ? q : shortest));
};

/**
 * Purpose: No-change probability computed two ways, so the aggregator can surface disagreement
 * instead of silently picking one.
 * - `derived`: `1 - pHike - pCut` from the (clipped) directional probabilities.
 * - `independent`: `1 - |E'[r] - rPre| / |step|`, where `E'[r]` is implied by the NEXT tenor past
 *   `post` and the step is taken in the direction that curve leans.
 * Returns: a consistent check with `checkTenorDays: null` when the curve has no second tenor.
 */
const crossCheckNoChange = (
  derived: number,
  quotes: OISQuote[],
  pre: OISQuote,
  post: OISQuote,
  daysToMeeting: number,
  stepSizes: PolicyStepSizes,
  tolerance: number
): NoChangeConsistency => {
  const later = quotes.filter((q) => q.tenorDays > post.tenorDays);
  const check = later.length > 0 ? later.reduce((a, q) => (q.tenorDays < a.tenorDays ? q : a)) : null;
  if (check === null) {
    return { derived, independent: derived, discrepancy: 0, consistent: true, checkTenorDays: null };
  }

  const drift =
    impliedPostMeetingRate({
      rPre: pre.rate,
      rPost: check.rate,
      dPre: daysToMeeting,
      dPost: check.tenorDays - daysToMeeting,
    }) - pre.rate;
  const leaningStep = drift >= 0 ? stepSizes.hike : stepSizes.cut;
  const independent = clipProbability(1 - Math.abs(drift) / Math.abs(leaningStep)).value;
  const discrepancy = Math.abs(derived - independent);
  return { derived, independent, discrepancy, consistent: discrepancy <= tolerance, checkTenorDays: check.tenorDays };
};

/**
 * Purpose: Full hike / cut / no-change read for the next meeting.
 * Parameters:
 * - `quotes: OISQuote[]`: validated OIS curve (decimal rates).
 * - `meeting: PolicyMeeting`: the active next meeting (`daysUntil` is D_pre).
 * - `stepSizes: PolicyStepSizes`: `hike > 0`, `cut < 0`.
 * - `options` (optional): overnight tenor and the consistency tolerance.
 * Returns: `RateProbabilityResult` with clipped probabilities, raw values and boundary flags.
 * Side effects: none.
 * Errors: `InvalidStepSizeError`, `InvalidTenorError`.
 *
 * Both directional probabilities come from the same E[r], so at most one of them is positive.
 */
export const computeRateProbabilities = (
  quotes: OISQuote[],
  meeting: PolicyMeeting,
  stepSizes: PolicyStepSizes,
  options: Partial<RateModelOptions> = {}
): RateProbabilityResult => {
  const { overnightTenorDays, consistencyTolerance } = { ...DEFAULT_OPTIONS, ...options };

  assertStep(stepSizes.hike, 'hike');
  assertStep(stepSizes.cut, 'cut');
  if (stepSizes.hike < 0) {
    throw new InvalidStepSizeError(`Hike step must be positive (hike=${stepSizes.hike})`, { hike: stepSizes.hike });
  }
  if (stepSizes.cut > 0) {
    throw new InvalidStepSizeError(`Cut step must be negative (cut=${stepSizes.cut})`, { cut: stepSizes.cut });
  }

  const pre = currentRateQuote(quotes, overnightTenorDays);
  const post = postMeetingQuote(quotes, meeting.daysUntil);
  const inputs: ImpliedRateInputs = {
    rPre: pre.rate,
    rPost: post.rate,
    dPre: meeting.daysUntil,
    dPost: post.tenorDays - meeting.daysUntil,
  };

  const impliedRate = impliedPostMeetingRate(inputs);
  const hike = impliedStepProbability(inputs, stepSizes.hike);
  const cut = impliedStepProbability(inputs, stepSizes.cut);
  const noChange = clipProbability(1 - hike.value - cut.value);
  const consistency = crossCheckNoChange(
    noChange.value,
    quotes,
    pre,
    post,
    meeting.daysUntil,
    stepSizes,
    consistencyTolerance
  );

  return {
    pNoChange: noChange.value,
    pHike: hike.value,
    pCut: cut.value,
    raw: { pNoChange: noChange.raw, pHike: hike.raw, pCut: cut.raw },
    boundary: { pNoChange: noChange.boundary, pHike: hike.boundary, pCut: cut.boundary },
    meetingDate: meeting.date,
    daysToMeeting: meeting.daysUntil,
    postTenorDays: post.tenorDays,
    currentRate: inputs.rPre,
    postRate: inputs.rPost,
    impliedRate,
    stepSizes: { ...stepSizes },
    consistency,
  };
};
