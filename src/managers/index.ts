// Export all manager components
export * from './AdminPolicy';
export * from './ContentGenerationManager';
export * from './DeliveryManager';
export * from './EntitlementManager';
export * from './EntitlementSweepManager';
export * from './IdempotencyFilter';
export * from './PaymentManager';
export * from './StatisticsManager';
