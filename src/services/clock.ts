/** Source of creation and update timestamps. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
