/**
 * DOMAIN LAYER
 *
 * Core ordering rules. No framework, database or HTTP code lives here.
 *
 * Contains:
 * - Entities: InProgressOrder (session-scoped), PlacedOrder (persisted), FoodItem
 * - Value Objects: OrderId, OrderStatus, OrderLine, Money, SessionId
 * - Exceptions: DomainException and its subclasses
 * - Services: OrderAggregatorService (pairing, merging and removal rules)
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - NO imports from external libraries
 */

export * from './entities';
export * from './value-objects';
export * from './exceptions';
export * from './services';
