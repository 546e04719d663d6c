import { AddToOrderUseCase } from '@application/use-cases';
import { ISessionStorePort } from '@application/ports';
import { UnexpectedError, ValidationError } from '@application/errors';
import { InProgressOrder } from '@domain/entities';
import { createMockSessionStore } from './session-store.mock';

describe('AddToOrderUseCase', () => {
  let mockSessionStore: jest.Mocked<ISessionStorePort>;
  let orders: Map<string, InProgressOrder>;
  let useCase: AddToOrderUseCase;

  const setUp = (initial: Record<string, InProgressOrder> = {}): void => {
    ({ store: mockSessionStore, orders } = createMockSessionStore(initial));
    useCase = new AddToOrderUseCase(mockSessionStore);
  };

  beforeEach(() => setUp());

  describe('successful additions', () => {
    it('should create the order on the first add', async () => {
      // Act
      const result = await useCase.execute({
        sessionId: 's1',
        items: ['Pizza', 'Pasta'],
        quantities: [2, 1],
      });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.fulfillmentText).toBe(
          'So far you have: 2 Pizza, 1 Pasta. Do you need anything else?',
        );
        expect(result.value.outcome).toBe('items_added');
        expect(result.value.currentOrder).toEqual([
          { itemName: 'Pizza', quantity: 2 },
          { itemName: 'Pasta', quantity: 1 },
        ]);
      }
      expect(orders.get('s1')?.toEntries()).toEqual([
        ['Pizza', 2],
        ['Pasta', 1],
      ]);
    });

    it('should overwrite quantities of items already in the order', async () => {
      // Arrange
      setUp({ s1: InProgressOrder.fromEntries([['Pizza', 2]]) });

      // Act
      const result = await useCase.execute({
        sessionId: 's1',
        items: ['Pizza', 'Samosa'],
        quantities: [1, 3],
      });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.fulfillmentText).toBe(
          'So far you have: 1 Pizza, 3 Samosa. Do you need anything else?',
        );
      }
    });

    it('should do the read-modify-write inside the session lock', async () => {
      // Act
      await useCase.execute({ sessionId: 's1', items: ['Pizza'], quantities: [1] });

      // Assert
      expect(mockSessionStore.runExclusive).toHaveBeenCalledTimes(1);
      expect(mockSessionStore.runExclusive.mock.calls[0][0].value).toBe('s1');
    });
  });

  describe('clarification', () => {
    it('should ask again when items and quantities differ in length', async () => {
      // Arrange
      setUp({ s1: InProgressOrder.fromEntries([['Pizza', 2]]) });

      // Act
      const result = await useCase.execute({
        sessionId: 's1',
        items: ['Pizza', 'Pasta'],
        quantities: [2],
      });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.fulfillmentText).toBe(
          "Sorry I didn't understand. Can you please specify food items and quantities clearly?",
        );
        expect(result.value.outcome).toBe('clarification_requested');
      }
      expect(mockSessionStore.runExclusive).not.toHaveBeenCalled();
      expect(mockSessionStore.put).not.toHaveBeenCalled();
      expect(orders.get('s1')?.toEntries()).toEqual([['Pizza', 2]]);
    });

    it('should ask again when nothing was recognised', async () => {
      // Act
      const result = await useCase.execute({ sessionId: 's1', items: [], quantities: [] });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.outcome).toBe('clarification_requested');
      }
      expect(orders.has('s1')).toBe(false);
    });
  });

  describe('errors', () => {
    it('should return ValidationError for a non-positive quantity', async () => {
      // Act
      const result = await useCase.execute({ sessionId: 's1', items: ['Pizza'], quantities: [0] });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(ValidationError);
        expect(result.value.message).toBe(
          'Quantity for "Pizza" must be a positive whole number, got 0',
        );
      }
    });

    it('should return UnexpectedError when the store fails', async () => {
      // Arrange
      mockSessionStore.put.mockRejectedValue(new Error('store unavailable'));

      // Act
      const result = await useCase.execute({ sessionId: 's1', items: ['Pizza'], quantities: [1] });

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(UnexpectedError);
        expect(result.value.statusCode).toBe(500);
        expect(result.value.message).toBe('An unexpected error occurred: store unavailable');
      }
    });
  });
});
