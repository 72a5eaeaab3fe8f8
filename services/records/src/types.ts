export type SequentialId = number;
export type UuidId = string;
export type RecordId = SequentialId | UuidId;

/** Fields the store assigns; callers never supply them. */
export interface StoreAssigned<K extends RecordId> {
  id: K;
  created_at: string; // ISO-8601, fixed at insert
}

export type StoredRecord<F, K extends RecordId> = F & StoreAssigned<K>;

// ---------- users service ----------
export interface UserFields {
  name: string;
  email: string;
  age?: number;
  is_active: boolean;
}

export type UserRecord = StoredRecord<UserFields, SequentialId>;

// ---------- inventory service ----------
export interface Manufacturer {
  name: string;
  homePage?: string;
  phone?: string;
}

export interface InventoryItemFields {
  name: string;
  releaseDate: string;
  manufacturer: Manufacturer;
}

export type InventoryItemRecord = StoredRecord<InventoryItemFields, UuidId>;

export interface DirectoryUserFields {
  username: string;
  email: string;
}

export type DirectoryUserRecord = StoredRecord<DirectoryUserFields, UuidId>;
