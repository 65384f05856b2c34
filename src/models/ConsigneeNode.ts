import mongoose, { Schema } from 'mongoose';

export interface IConsigneeNode {
  consigneeId: string;
  name?: string;
  children: string[];
}

const ConsigneeNodeSchema = new Schema<IConsigneeNode>(
  {
    consigneeId: { type: String, required: true, unique: true },
    name: String,
    children: { type: [String], default: [] },
  },
  { collection: 'consignee_hierarchy' }
);

export const ConsigneeNode = mongoose.model<IConsigneeNode>('ConsigneeNode', ConsigneeNodeSchema);
