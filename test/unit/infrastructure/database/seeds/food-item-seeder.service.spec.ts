import { IFoodItemRepositoryPort } from '@application/ports/outbound';
import { FoodItem } from '@domain/entities';
import { Money } from '@domain/value-objects';
import { FoodItemSeederService } from '@infrastructure/database/seeds/food-item-seeder.service';
import { FOOD_ITEMS_SEED_DATA } from '@infrastructure/database/seeds/food-items.data';

describe('FoodItemSeederService', () => {
  let mockFoodItemRepository: jest.Mocked<IFoodItemRepositoryPort>;
  let seeder: FoodItemSeederService;

  beforeEach(() => {
    mockFoodItemRepository = {
      findByName: jest.fn(),
      findAll: jest.fn(),
      saveMany: jest.fn(),
      deleteAll: jest.fn(),
    };
    seeder = new FoodItemSeederService(mockFoodItemRepository);
  });

  describe('seed', () => {
    it('should upsert the whole built-in menu', async () => {
      // Arrange
      mockFoodItemRepository.saveMany.mockResolvedValue(FOOD_ITEMS_SEED_DATA.length);

      // Act
      const written = await seeder.seed();

      // Assert
      expect(written).toBe(10);
      const [items] = mockFoodItemRepository.saveMany.mock.calls[0];
      expect(items).toHaveLength(10);
      const pizza = items.find((item) => item.name === 'Pizza');
      expect(pizza?.price.format()).toBe('$8.00');
    });
  });

  describe('reseed', () => {
    it('should clear the catalog before seeding', async () => {
      // Arrange
      const calls: string[] = [];
      mockFoodItemRepository.deleteAll.mockImplementation(async () => {
        calls.push('deleteAll');
        return 4;
      });
      mockFoodItemRepository.saveMany.mockImplementation(async (items) => {
        calls.push('saveMany');
        return items.length;
      });

      // Act
      const written = await seeder.reseed();

      // Assert
      expect(written).toBe(10);
      expect(calls).toEqual(['deleteAll', 'saveMany']);
    });
  });

  describe('getStats', () => {
    it('should report the count and the price extremes', async () => {
      // Arrange
      mockFoodItemRepository.findAll.mockResolvedValue([
        FoodItem.create({ name: 'Pasta', price: Money.fromCents(750) }),
        FoodItem.create({ name: 'Vada Pav', price: Money.fromCents(400) }),
        FoodItem.create({ name: 'Vegetable Biryani', price: Money.fromCents(900) }),
      ]);

      // Act
      const stats = await seeder.getStats();

      // Assert
      expect(stats).toEqual({
        totalItems: 3,
        cheapest: 'Vada Pav ($4.00)',
        mostExpensive: 'Vegetable Biryani ($9.00)',
      });
    });

    it('should report an empty catalog', async () => {
      // Arrange
      mockFoodItemRepository.findAll.mockResolvedValue([]);

      // Act & Assert
      expect(await seeder.getStats()).toEqual({
        totalItems: 0,
        cheapest: null,
        mostExpensive: null,
      });
    });
  });
});
