/**
 * layout.ts — Steam Deck joystick identifiers
 *
 * The firmware exposes the D-pad as four buttons rather than a hat, and the
 * triggers as axes 4/5 running from -32768 (released) to 32767 (full pull).
 *
 *   Buttons:  A 0   B 1   X 2   Y 3
 *             L3 7  R3 8  L1 9  R1 10
 *             D-pad Up 11  Down 12  Left 13  Right 14
 *             Back grips R4 16  L4 17  R5 18  L5 19
 *
 *   Axes:     LX 0  LY 1  RX 2  RY 3  L2 4  R2 5
 */

export const DECK_BUTTONS = {
  A:     0,
  B:     1,
  X:     2,
  Y:     3,
  L3:    7,
  R3:    8,
  L1:    9,
  R1:    10,
  Up:    11,
  Down:  12,
  Left:  13,
  Right: 14,
  R4:    16,
  L4:    17,
  R5:    18,
  L5:    19,
} as const;

export const DECK_AXES = {
  LX: 0,
  LY: 1,
  RX: 2,
  RY: 3,
  L2: 4,
  R2: 5,
} as const;
