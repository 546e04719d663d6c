export { OrderId } from './order-id.vo';
export { OrderStatus } from './order-status.vo';
export { OrderLine } from './order-line.vo';
export { Money } from './money.vo';
export { SessionId } from './session-id.vo';
