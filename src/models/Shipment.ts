import mongoose, { Schema } from 'mongoose';

// Dates are kept as ISO strings, as the ingest writes them.
export interface IShipment {
  document_id: string;
  consignee_codes: string[];
  container_number?: string;
  container_type?: string;
  po_numbers: string[];
  booking_numbers: string[];
  obl_nos: string[];
  load_port?: string;
  final_load_port?: string;
  discharge_port?: string;
  last_cy_location?: string;
  place_of_receipt?: string;
  place_of_delivery?: string;
  final_destination?: string;
  first_vessel_name?: string;
  final_vessel_name?: string;
  final_carrier_name?: string;
  true_carrier_scac_name?: string;
  transport_mode?: string;
  job_type?: string;
  shipment_status?: string;
  hot_container_flag?: string;
  delayed_dp?: string;
  delayed_fd?: string;
  supplier_vendor_name?: string;
  manufacturer_name?: string;
  consignee_name?: string;
  delay_reason_summary?: string;
  etd_lp_date?: string;
  atd_lp_date?: string;
  eta_dp_date?: string;
  eta_fd_date?: string;
  optimal_ata_dp_date?: string;
  optimal_eta_fd_date?: string;
  out_gate_from_dp_date?: string;
  delivery_to_consignee_date?: string;
  empty_container_return_date?: string;
  cargo_ready_date?: string;
  dp_delayed_dur?: number;
  fd_delayed_dur?: number;
  detention_free_days?: number;
  demurrage_free_days?: number;
  cargo_weight_kg?: number;
  cargo_measure_cubic_meter?: number;
  cargo_count?: number;
  co2_well_to_wheel?: number;
}

const ShipmentSchema = new Schema<IShipment>(
  {
    document_id: { type: String, required: true, unique: true },
    consignee_codes: { type: [String], required: true, index: true },
    container_number: { type: String, index: true },
    container_type: String,
    po_numbers: { type: [String], default: [], index: true },
    booking_numbers: { type: [String], default: [] },
    obl_nos: { type: [String], default: [] },
    load_port: String,
    final_load_port: String,
    discharge_port: { type: String, index: true },
    last_cy_location: String,
    place_of_receipt: String,
    place_of_delivery: String,
    final_destination: String,
    first_vessel_name: String,
    final_vessel_name: String,
    final_carrier_name: String,
    true_carrier_scac_name: String,
    transport_mode: String,
    job_type: String,
    shipment_status: String,
    hot_container_flag: String,
    delayed_dp: String,
    delayed_fd: String,
    supplier_vendor_name: String,
    manufacturer_name: String,
    consignee_name: String,
    delay_reason_summary: String,
    etd_lp_date: String,
    atd_lp_date: String,
    eta_dp_date: String,
    eta_fd_date: String,
    optimal_ata_dp_date: String,
    optimal_eta_fd_date: String,
    out_gate_from_dp_date: String,
    delivery_to_consignee_date: String,
    empty_container_return_date: String,
    cargo_ready_date: String,
    dp_delayed_dur: Number,
    fd_delayed_dur: Number,
    detention_free_days: Number,
    demurrage_free_days: Number,
    cargo_weight_kg: Number,
    cargo_measure_cubic_meter: Number,
    cargo_count: Number,
    co2_well_to_wheel: Number,
  },
  {
    collection: 'shipments',
    strict: false,
  }
);

ShipmentSchema.index({ consignee_codes: 1, optimal_ata_dp_date: 1 });

export const Shipment = mongoose.model<IShipment>('Shipment', ShipmentSchema);
