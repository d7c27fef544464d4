export class WebhookAuthenticationError extends Error {
  readonly code = 'WEBHOOK_AUTH_FAILED' as const;
  constructor(readonly reason: string) {
    super(`Webhook signature rejected: ${reason}`);
    this.name = 'WebhookAuthenticationError';
  }
}

export class AccountNotFoundError extends Error {
  readonly code = 'ACCOUNT_NOT_FOUND' as const;
  constructor(readonly reference: string) {
    super(`No account matches ${reference}`);
    this.name = 'AccountNotFoundError';
  }
}
