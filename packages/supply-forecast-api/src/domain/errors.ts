export class ItemNotFoundError extends Error {
  readonly code = "item_not_found";

  constructor(readonly itemId: string) {
    super(`inventory item not found: ${itemId}`);
    this.name = "ItemNotFoundError";
  }
}
