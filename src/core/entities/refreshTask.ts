export type RefreshTaskEntity = {
  id: string;
  ticker: string;
  requestedAt: Date;
  idempotencyKey: string;
};
