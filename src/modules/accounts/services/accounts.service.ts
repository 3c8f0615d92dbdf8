import type { LedgerContext } from "../../../types.js";
import { NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";
import type {
  AccountCreatePayload,
  AccountUpdatePayload,
  ListAccountsQuery,
} from "../schemas/accounts.schemas.js";

export async function createAccount(ctx: LedgerContext, payload: AccountCreatePayload) {
  const account = await ctx.store.write((uow) => uow.accounts.insert(payload));
  ctx.log.info(`[accounts] created ${account.code} (${account.classification})`);
  return account;
}

export async function getAccount(ctx: LedgerContext, id: string) {
  const account = await ctx.store.read((readers) => readers.accounts.findById(id));
  if (!account) throw new NotFoundError("Account", id);
  return account;
}

export async function listAccounts(ctx: LedgerContext, query: ListAccountsQuery = {}) {
  return ctx.store.read((readers) => readers.accounts.list(query));
}

export async function updateAccount(ctx: LedgerContext, id: string, payload: AccountUpdatePayload) {
  return ctx.store.write(async (uow) => {
    const current = await uow.accounts.lockForUpdate(id);
    if (!current) throw new NotFoundError("Account", id);
    const updated = await uow.accounts.update(id, payload);
    if (!updated) throw new NotFoundError("Account", id);
    return updated;
  });
}

/** Rejected while any ledger entry still posts to the account. */
export async function deleteAccount(ctx: LedgerContext, id: string) {
  await ctx.store.write(async (uow) => {
    const current = await uow.accounts.lockForUpdate(id);
    if (!current) throw new NotFoundError("Account", id);

    const references = await uow.entries.countByAccount(id);
    if (references > 0) throw new ReferentialIntegrityError("Account", id, "LedgerEntry", references);

    await uow.accounts.delete(id);
  });
  ctx.log.info(`[accounts] deleted ${id}`);
  return { id, deleted: true };
}
