import { z } from 'zod';
import { Either, left, right } from '../common/either';
import { ValidationError } from '../errors/application.errors';

/**
 * Zod schemas for the parameters each intent carries.
 *
 * The agent sends a single value or a list for list-typed slots depending on
 * how the user phrased the request, and numbers sometimes arrive as strings.
 * Both shapes are normalized to arrays / integers here.
 */

const foodItemName = z.string().trim().min(1, 'food item names cannot be empty');

// A JSON number or a numeric string; booleans and nested lists are not numbers.
const numeric = (message: string) =>
  z.union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/, message)], { message });

const quantity = numeric('quantities must be numbers').pipe(
  z.coerce.number<string | number>().int('quantities must be whole numbers').positive('quantities must be positive'),
);

const foodItemList = z
  .union([z.array(foodItemName), foodItemName])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const quantityList = z
  .union([z.array(quantity), quantity])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const addToOrderParametersSchema = z.object({
  'food-item': foodItemList,
  number: quantityList,
});

export const removeFromOrderParametersSchema = z.object({
  'food-item': foodItemList,
});

export const trackOrderParametersSchema = z.object({
  number: numeric('order id must be a number').pipe(
    z.coerce.number<string | number>().int('order id must be a whole number').positive('order id must be positive'),
  ),
});

export type AddToOrderParameters = z.infer<typeof addToOrderParametersSchema>;
export type RemoveFromOrderParameters = z.infer<typeof removeFromOrderParametersSchema>;
export type TrackOrderParameters = z.infer<typeof trackOrderParametersSchema>;

/**
 * Parses an intent's parameters, reporting the first issue as a ValidationError.
 */
export function parseIntentParameters<S extends z.ZodType>(
  schema: S,
  parameters: unknown,
): Either<ValidationError, z.output<S>> {
  const result = schema.safeParse(parameters);

  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : undefined;
    const message = issue ? issue.message : 'Invalid parameters';
    return left(new ValidationError(field ? `${field}: ${message}` : message, field));
  }

  return right(result.data);
}
