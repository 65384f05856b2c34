// Shipment field names and domain limits shared across stages.

export type DelayBasis = 'dischargePort' | 'finalDestination';

/** Delay duration column per basis. The delay-reason handler and the analytics drafter both read this. */
export const DELAY_DURATION_FIELDS: Record<DelayBasis, string> = {
  dischargePort: 'dp_delayed_dur',
  finalDestination: 'fd_delayed_dur',
};

export const DEFAULT_DELAY_BASIS: DelayBasis = 'dischargePort';

export const DELAY_BASIS_LABELS: Record<DelayBasis, string> = {
  dischargePort: 'discharge port',
  finalDestination: 'final destination',
};

/** Arrival date columns in order of preference, per basis. */
export const ETA_FIELDS: Record<DelayBasis, readonly string[]> = {
  dischargePort: ['optimal_ata_dp_date', 'eta_dp_date'],
  finalDestination: ['optimal_eta_fd_date', 'eta_fd_date'],
};

/** Location columns from most to least recent milestone. */
export const LOCATION_FIELDS: readonly string[] = [
  'delivery_to_consignee_lcn',
  'out_gate_at_last_cy_lcn',
  'equipment_arrived_at_last_cy_lcn',
  'out_gate_from_dp_lcn',
  'last_cy_location',
  'discharge_port',
  'load_port',
];

export const FINAL_DESTINATION_PATTERN = /\b(final destination|fd|in-dc)\b/;

export const MAX_RETRIEVAL_IDENTIFIERS = 5;

/** One drafted plan plus exactly one regeneration. */
export const MAX_ANALYTICS_ATTEMPTS = 2;

export const DEFAULT_TIME_WINDOW_DAYS = 7;

export const ANALYTICS_RESULT_NAME = 'result';

export function delayBasisFor(question: string): DelayBasis {
  return FINAL_DESTINATION_PATTERN.test(question) ? 'finalDestination' : DEFAULT_DELAY_BASIS;
}
