export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Unix seconds, the unit every timestamp column uses. */
export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
