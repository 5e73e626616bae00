export interface Contact {
  contactId: number;
  name: string;
  lastname: string;
  phone: string | null;
  direction: string | null;
  email: string | null;
  web: string | null;
}

export type ContactSummary = Pick<Contact, 'contactId' | 'name' | 'lastname'>;

// Validated, normalized values ready to be bound to a statement.
export type ContactInput = Omit<Contact, 'contactId'>;

export const CONTACT_FIELDS = ['Name', 'Lastname', 'Phone', 'Direction', 'Email', 'Web'] as const;

export type ContactField = (typeof CONTACT_FIELDS)[number];

/**
 * Raw user input. Keys follow the column names (`Name`, `Email`, ...);
 * lower camel case keys (`name`, `email`, ...) are accepted as well.
 */
export type RawContactInput = Partial<Record<ContactField | Uncapitalize<ContactField>, string | null>>;

export interface SearchCriteria {
  name?: string | null;
  direction?: string | null;
  email?: string | null;
}
