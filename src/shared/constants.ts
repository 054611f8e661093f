/** Discriminators of the built-in transport variants. */
export const VARIANTS = {
  CAR: 'car',
  BICYCLE: 'bicycle',
  MOTORBIKE: 'motorbike',
} as const;
