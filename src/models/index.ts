export * from './Shipment';
export * from './ConsigneeNode';
export * from './ConversationSession';
