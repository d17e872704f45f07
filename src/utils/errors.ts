export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code?: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class EventSaveError extends AppError {
  constructor(message: string = 'Error saving event') {
    super(message, 500, 'EVENT_SAVE_FAILED');
  }
}
