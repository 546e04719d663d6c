export * from './either';
export * from './fulfillment-messages';
