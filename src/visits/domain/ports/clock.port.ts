/**
 * Source of "now" for every expiry and countdown decision.
 */
export abstract class Clock {
  abstract now(): Date;
}
