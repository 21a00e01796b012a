export interface UserProfile {
  phone: string;
  name?: string;
  password?: string; // stored as plain text
  attributes: Record<string, unknown>; // extra registration form fields, kept verbatim
}
