// Source of "now" for time-gated rules; tests pass a fixed one
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
