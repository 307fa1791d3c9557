export type ShoppingListErrorCode = 'not-found' | 'invalid-input'

export class ShoppingListError extends Error {
  readonly code: ShoppingListErrorCode

  constructor(code: ShoppingListErrorCode, message: string) {
    super(message)
    this.name = 'ShoppingListError'
    this.code = code
  }
}
