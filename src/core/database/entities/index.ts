export * from './kofi-transaction.entity';
export * from './kofi-user.entity';
