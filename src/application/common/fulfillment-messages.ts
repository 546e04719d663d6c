/**
 * Texts sent back to the conversational agent, which reads them to the user
 * verbatim. Kept in one place so tests and handlers agree on the wording.
 */
export const FULFILLMENT_MESSAGES = {
  clarifyItemsAndQuantities:
    "Sorry I didn't understand. Can you please specify food items and quantities clearly?",
  orderSoFar: (summary: string): string =>
    `So far you have: ${summary}. Do you need anything else?`,

  removeOrderNotFound:
    "I'm having a trouble finding your order. Sorry! Can you place a new order please?",
  removedItems: (items: readonly string[]): string => `Removed ${items.join(',')} from your order!`,
  itemsNotInOrder: (items: readonly string[]): string =>
    `Your current order does not have ${items.join(',')}.`,
  orderIsEmpty: 'Your order is empty!',
  remainingItems: (summary: string): string => `Here is what is left in your order: ${summary}`,

  completeOrderNotFound:
    "I'm having trouble finding your order. Sorry! Can you place a new order please?",
  nothingToPlace: 'Your order is empty. Please add some items before placing it.',
  placementFailed:
    "Sorry, I couldn't process your order due to a backend error. Please place a new order again",
  orderPlaced: (orderId: string, total: string): string =>
    `Awesome. We have placed your order. Here is your order id # ${orderId}. Your order total is ${total} which you can pay at the time of delivery!`,

  orderStatus: (orderId: string, status: string): string =>
    `The order status for order id: ${orderId} is: ${status}`,
  noSuchOrder: (orderId: string): string => `No order found with order id: ${orderId}`,

  orderCancelled:
    "Your order has been cancelled. Feel free to start a new one whenever you're ready.",
  nothingToCancel: "You don't have an order in progress to cancel.",
} as const;
