export * from './types';
export { SupabasePersistenceGateway, type SupabaseTables } from './supabase';
