export enum InteractionKind {
  APPOINTMENT = 'Appointment',
  CONTRACT = 'Contract',
  CALL = 'Call',
  EMAIL = 'Email',
  OTHER = 'Other',
}

export const INTERACTION_KINDS: readonly InteractionKind[] = [
  InteractionKind.APPOINTMENT,
  InteractionKind.CONTRACT,
  InteractionKind.CALL,
  InteractionKind.EMAIL,
  InteractionKind.OTHER,
];

/**
 * Maps a display string back to its kind. Matching is exact and
 * case-sensitive; anything unrecognised is filed under OTHER.
 */
export function parseInteractionKind(display: string): InteractionKind {
  switch (display) {
    case 'Appointment':
      return InteractionKind.APPOINTMENT;
    case 'Contract':
      return InteractionKind.CONTRACT;
    case 'Call':
      return InteractionKind.CALL;
    case 'Email':
      return InteractionKind.EMAIL;
    case 'Other':
      return InteractionKind.OTHER;
    default:
      return InteractionKind.OTHER;
  }
}
