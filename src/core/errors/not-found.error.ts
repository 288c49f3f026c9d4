import { BaseError } from './base-error.js';

export class NotFoundError extends BaseError {
  constructor(message = 'Not found') {
    super('NOT_FOUND', 404, message);
  }
}

export class TemplateNotFoundError extends NotFoundError {
  constructor(public readonly templateId: string) {
    super(`Template not found: ${templateId}`);
    this.code = 'TEMPLATE_NOT_FOUND';
  }
}
