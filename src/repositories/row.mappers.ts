import { QueryResultRow } from 'pg';
import { Book, Loan, LoanDetails } from '../types/library.types';
import { User, UserRole, USER_ROLES } from '../types/user.types';
import { parsePermissions } from '../utils/permission.utils';

function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function toRole(value: unknown): UserRole {
  const role = USER_ROLES.find((candidate) => candidate === value);
  if (!role) {
    throw new Error(`Unknown user role in database: ${String(value)}`);
  }
  return role;
}

export function mapUserRow(row: QueryResultRow): User {
  return {
    userId: Number(row.user_id),
    username: String(row.username),
    passwordHash: String(row.password_hash),
    role: toRole(row.role),
    createdAt: toDate(row.created_at),
    phone: toNullableString(row.phone),
    permissions: parsePermissions(toNullableString(row.permissions)),
  };
}

export function mapBookRow(row: QueryResultRow): Book {
  return {
    bookId: Number(row.book_id),
    title: String(row.title),
    author: String(row.author),
    isbn: toNullableString(row.isbn),
    quantity: Number(row.quantity),
    availableQuantity: Number(row.available_quantity),
    addedAt: toDate(row.added_at),
  };
}

// Date columns are selected as ::text so they arrive as YYYY-MM-DD
export function mapLoanRow(row: QueryResultRow): Loan {
  return {
    loanId: Number(row.loan_id),
    userId: Number(row.user_id),
    bookId: Number(row.book_id),
    loanDate: String(row.loan_date),
    dueDate: String(row.due_date),
    returnDate: toNullableString(row.return_date),
  };
}

export function mapLoanDetailsRow(row: QueryResultRow): LoanDetails {
  return {
    ...mapLoanRow(row),
    username: String(row.username),
    title: String(row.title),
    author: String(row.author),
  };
}
