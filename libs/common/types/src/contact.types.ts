/**
 * ContactBook Contact Types
 */

export interface Contact {
  id: number;
  user_id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone: string;
  birthday: string | null; // YYYY-MM-DD
  additional_info: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface ContactInput {
  first_name: string;
  last_name: string;
  email: string;
  phone: string;
  birthday?: string | null;
  additional_info?: string | null;
}

export type ContactChanges = Partial<ContactInput>;

export interface ContactFilter {
  name?: string;
  email?: string;
}
