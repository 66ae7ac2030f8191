/**
 * backend/src/shared/db/database.schema.ts
 *
 * Kysely table types. Must match src/shared/db/migrations.
 */

import type { ColumnType } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type DefaultedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type OrderStatusColumn = 'PENDING' | 'PROCESSING' | 'COMPLETED' | 'CANCELLED';

export interface UsersTable {
  id: string;
  email: string;
  name: string;
  password_hash: string;
  created_at: DefaultedTimestamp;
  updated_at: DefaultedTimestamp;
}

export interface RefreshTokensTable {
  id: string;
  user_id: string;
  token: string;
  expires_at: Timestamp;
  created_at: DefaultedTimestamp;
}

export interface OrdersTable {
  id: string;
  user_id: string;
  product_name: string;
  amount: number;
  status: OrderStatusColumn;
  created_at: DefaultedTimestamp;
}

export interface DB {
  users: UsersTable;
  refresh_tokens: RefreshTokensTable;
  orders: OrdersTable;
}
