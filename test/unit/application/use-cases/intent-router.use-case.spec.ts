import { left, right } from '@application/common';
import { fulfillment, WebhookEventDto } from '@application/dtos';
import {
  ApplicationError,
  IntentNotFoundError,
  SessionNotIdentifiedError,
  UnexpectedError,
  ValidationError,
} from '@application/errors';
import {
  IAddToOrderPort,
  ICancelOrderPort,
  ICompleteOrderPort,
  IRemoveFromOrderPort,
  ITrackOrderPort,
} from '@application/ports';
import { IntentRouterUseCase } from '@application/use-cases';

class QuotaExceededError extends ApplicationError {
  readonly code = 'QUOTA_EXCEEDED';
  readonly statusCode = 429;
}

describe('IntentRouterUseCase', () => {
  let mockAddToOrder: jest.Mocked<IAddToOrderPort>;
  let mockRemoveFromOrder: jest.Mocked<IRemoveFromOrderPort>;
  let mockCompleteOrder: jest.Mocked<ICompleteOrderPort>;
  let mockTrackOrder: jest.Mocked<ITrackOrderPort>;
  let mockCancelOrder: jest.Mocked<ICancelOrderPort>;
  let router: IntentRouterUseCase;

  const sessionContexts = [
    { name: 'projects/demo/agent/sessions/s1/contexts/ongoing-order' },
    { name: 'projects/demo/agent/sessions/s1/contexts/other' },
  ];

  const event = (overrides: Partial<WebhookEventDto> = {}): WebhookEventDto => ({
    intent: 'order.add- context: ongoing-order',
    parameters: {},
    outputContexts: sessionContexts,
    ...overrides,
  });

  beforeEach(() => {
    mockAddToOrder = { execute: jest.fn() };
    mockRemoveFromOrder = { execute: jest.fn() };
    mockCompleteOrder = { execute: jest.fn() };
    mockTrackOrder = { execute: jest.fn() };
    mockCancelOrder = { execute: jest.fn() };

    mockAddToOrder.execute.mockResolvedValue(right(fulfillment('added', 'items_added')));
    mockRemoveFromOrder.execute.mockResolvedValue(right(fulfillment('removed', 'items_removed')));
    mockCompleteOrder.execute.mockResolvedValue(right(fulfillment('placed', 'order_placed')));
    mockTrackOrder.execute.mockResolvedValue(right(fulfillment('tracked', 'status_found')));
    mockCancelOrder.execute.mockResolvedValue(right(fulfillment('cancelled', 'order_cancelled')));

    router = new IntentRouterUseCase(
      mockAddToOrder,
      mockRemoveFromOrder,
      mockCompleteOrder,
      mockTrackOrder,
      mockCancelOrder,
    );
  });

  describe('routing', () => {
    it('should route an add with scalar parameters, normalizing them to lists', async () => {
      // Act
      const result = await router.execute(
        event({ parameters: { 'food-item': 'Pizza', number: '2' } }),
      );

      // Assert
      expect(mockAddToOrder.execute).toHaveBeenCalledWith({
        sessionId: 's1',
        items: ['Pizza'],
        quantities: [2],
      });
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value).toEqual({
          fulfillmentText: 'added',
          outcome: 'items_added',
          intent: 'add',
        });
      }
    });

    it('should route an add with list parameters', async () => {
      // Act
      await router.execute(
        event({ parameters: { 'food-item': ['Pizza', 'Pasta'], number: [2, 1] } }),
      );

      // Assert
      expect(mockAddToOrder.execute).toHaveBeenCalledWith({
        sessionId: 's1',
        items: ['Pizza', 'Pasta'],
        quantities: [2, 1],
      });
    });

    it('should route a remove', async () => {
      // Act
      const result = await router.execute(
        event({
          intent: 'order.remove- context: ongoing-order',
          parameters: { 'food-item': ['Pasta', 'Soda'] },
        }),
      );

      // Assert
      expect(mockRemoveFromOrder.execute).toHaveBeenCalledWith({
        sessionId: 's1',
        items: ['Pasta', 'Soda'],
      });
      expect(result.isRight() && result.value.intent).toBe('remove');
    });

    it('should route complete and cancel with only the session id', async () => {
      // Act
      await router.execute(event({ intent: 'order.complete-context: ongoing-order' }));
      await router.execute(event({ intent: 'order.cancel- context: ongoing-order' }));

      // Assert
      expect(mockCompleteOrder.execute).toHaveBeenCalledWith({ sessionId: 's1' });
      expect(mockCancelOrder.execute).toHaveBeenCalledWith({ sessionId: 's1' });
    });

    it('should route a track without needing a session', async () => {
      // Act
      const result = await router.execute(
        event({
          intent: 'track.order-context: ongoing-tracking',
          parameters: { number: 41 },
          outputContexts: [],
        }),
      );

      // Assert
      expect(mockTrackOrder.execute).toHaveBeenCalledWith({ orderId: 41 });
      expect(result.isRight() && result.value.intent).toBe('track');
    });
  });

  describe('rejections', () => {
    it('should return IntentNotFoundError for an unknown intent', async () => {
      // Act
      const result = await router.execute(event({ intent: 'Default Welcome Intent' }));

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(IntentNotFoundError);
        expect(result.value.message).toBe("Intent 'Default Welcome Intent' not found");
        expect(result.value.statusCode).toBe(400);
      }
    });

    it('should match intent names exactly', async () => {
      // Act
      const result = await router.execute(event({ intent: 'order.add - context: ongoing-order' }));

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(IntentNotFoundError);
      expect(mockAddToOrder.execute).not.toHaveBeenCalled();
    });

    it('should reject a session intent without output contexts', async () => {
      // Act
      const result = await router.execute(
        event({ intent: 'order.complete-context: ongoing-order', outputContexts: [] }),
      );

      // Assert
      expect(result.isLeft() && result.value).toBeInstanceOf(SessionNotIdentifiedError);
      expect(mockCompleteOrder.execute).not.toHaveBeenCalled();
    });

    it('should reject a session intent whose context name carries no session', async () => {
      // Act
      const result = await router.execute(
        event({ outputContexts: [{ name: 'projects/demo/agent/contexts/ongoing-order' }] }),
      );

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(SessionNotIdentifiedError);
        expect(result.value.code).toBe('VALIDATION_ERROR');
      }
    });

    it('should reject a non-numeric quantity', async () => {
      // Act
      const result = await router.execute(
        event({ parameters: { 'food-item': ['Pizza'], number: ['two'] } }),
      );

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(ValidationError);
        expect(result.value.message).toMatch(/^number/);
      }
      expect(mockAddToOrder.execute).not.toHaveBeenCalled();
    });

    it('should reject a remove without food items', async () => {
      // Act
      const result = await router.execute(
        event({ intent: 'order.remove- context: ongoing-order', parameters: {} }),
      );

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(ValidationError);
        expect(result.value.message).toMatch(/^food-item/);
      }
    });

    it('should reject a fractional order id', async () => {
      // Act
      const result = await router.execute(
        event({ intent: 'track.order-context: ongoing-tracking', parameters: { number: 2.5 } }),
      );

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft() && result.value instanceof ValidationError) {
        expect(result.value.field).toBe('number');
        expect(result.value.message).toBe('number: order id must be a whole number');
      }
      expect(mockTrackOrder.execute).not.toHaveBeenCalled();
    });
  });

  describe('handler failures', () => {
    it('should pass a handler ValidationError through unchanged', async () => {
      // Arrange
      const error = new ValidationError('Quantity for "Pizza" must be a positive whole number, got 0');
      mockAddToOrder.execute.mockResolvedValue(left(error));

      // Act
      const result = await router.execute(
        event({ parameters: { 'food-item': 'Pizza', number: 1 } }),
      );

      // Assert
      expect(result.isLeft() && result.value).toBe(error);
    });

    it('should turn an unlisted application error into UnexpectedError', async () => {
      // Arrange
      mockCancelOrder.execute.mockResolvedValue(left(new QuotaExceededError('quota exceeded')));

      // Act
      const result = await router.execute(event({ intent: 'order.cancel- context: ongoing-order' }));

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(UnexpectedError);
        expect(result.value.message).toBe('An unexpected error occurred: quota exceeded');
      }
    });

    it('should turn a rejected handler into UnexpectedError', async () => {
      // Arrange
      mockCompleteOrder.execute.mockRejectedValue(new Error('boom'));

      // Act
      const result = await router.execute(event({ intent: 'order.complete-context: ongoing-order' }));

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(UnexpectedError);
        expect(result.value.statusCode).toBe(500);
      }
    });
  });
});
