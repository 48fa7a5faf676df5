export enum VisitStage {
  IDENTITY_PENDING = 'identity_pending',
  AWAITING_CONFIRMATION = 'awaiting_confirmation',
  CONFIRMED = 'confirmed',
}
