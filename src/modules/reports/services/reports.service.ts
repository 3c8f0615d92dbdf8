import type { LedgerContext } from "../../../types.js";
import type { AccountRecord, DateRange, LedgerEntryRecord, Readers } from "../../../store/types.js";
import type { AccountClassification } from "../../../utils/constants.js";
import { ConstraintViolation, NotFoundError } from "../../../utils/errors.js";
import { divideRounded, fromScaled, sumAmounts, toScaled } from "../../../utils/money.js";
import type {
  GeneralLedgerQuery,
  InvoiceStatsQuery,
  JournalQuery,
  PeriodBalanceQuery,
  TopClientsQuery,
} from "../schemas/reports.schemas.js";

export interface AccountMovement {
  code: string;
  name: string;
  classification: AccountClassification;
  debit: string;
  credit: string;
  balance: string;
}

export interface MajorAccountGroup {
  majorCode: string;
  name: string;
  debit: string;
  credit: string;
  balance: string;
  accounts: AccountMovement[];
}

export interface GeneralLedgerReport {
  groups: MajorAccountGroup[];
  summary: {
    groupCount: number;
    totalDebit: string;
    totalCredit: string;
    difference: string;
  };
  filters: { digits: number; from: string | null; to: string | null; includeDetail: boolean };
}

function assertRange(range: DateRange) {
  if (range.from && range.to && range.from > range.to) {
    throw new ConstraintViolation("'from' must not be after 'to'", {
      from: range.from.toISOString(),
      to: range.to.toISOString(),
    });
  }
}

/** First `digits` characters of the code, right-padded with zeros when shorter. */
export function majorCodeOf(code: string, digits: number): string {
  return code.length >= digits ? code.slice(0, digits) : code.padEnd(digits, "0");
}

async function entriesInRange(readers: Readers, range: DateRange): Promise<LedgerEntryRecord[]> {
  if (!range.from && !range.to) return (await readers.entries.list({})).rows;
  const { rows } = await readers.transactions.list(range);
  return readers.entries.listByTransactions(rows.map((row) => row.id));
}

/**
 * Debit and credit totals per account, grouped under major accounts.
 * Accounts without movements in the range are listed with zeros.
 */
export async function generalLedger(ctx: LedgerContext, query: GeneralLedgerQuery): Promise<GeneralLedgerReport> {
  assertRange(query);

  const { accounts, entries } = await ctx.store.read(async (readers) => ({
    accounts: await readers.accounts.list(),
    entries: await entriesInRange(readers, query),
  }));

  const totals = new Map<string, { debit: bigint; credit: bigint }>();
  for (const entry of entries) {
    const current = totals.get(entry.accountId) ?? { debit: 0n, credit: 0n };
    current.debit += toScaled(entry.debit);
    current.credit += toScaled(entry.credit);
    totals.set(entry.accountId, current);
  }

  const byCode = new Map<string, AccountRecord>(accounts.map((account) => [account.code, account]));
  const groups = new Map<string, { debit: bigint; credit: bigint; accounts: AccountMovement[] }>();

  for (const account of accounts) {
    const sums = totals.get(account.id) ?? { debit: 0n, credit: 0n };
    const majorCode = majorCodeOf(account.code, query.digits);
    const group = groups.get(majorCode) ?? { debit: 0n, credit: 0n, accounts: [] };
    group.debit += sums.debit;
    group.credit += sums.credit;
    if (query.includeDetail) {
      group.accounts.push({
        code: account.code,
        name: account.name,
        classification: account.classification,
        debit: fromScaled(sums.debit),
        credit: fromScaled(sums.credit),
        balance: fromScaled(sums.debit - sums.credit),
      });
    }
    groups.set(majorCode, group);
  }

  let totalDebit = 0n;
  let totalCredit = 0n;
  const rows: MajorAccountGroup[] = [...groups.keys()].sort().map((majorCode) => {
    const group = groups.get(majorCode) ?? { debit: 0n, credit: 0n, accounts: [] };
    totalDebit += group.debit;
    totalCredit += group.credit;
    return {
      majorCode,
      name: byCode.get(majorCode)?.name ?? `Major account ${majorCode}`,
      debit: fromScaled(group.debit),
      credit: fromScaled(group.credit),
      balance: fromScaled(group.debit - group.credit),
      accounts: group.accounts.sort((a, b) => a.code.localeCompare(b.code)),
    };
  });

  const difference = totalDebit - totalCredit;
  ctx.log.debug(`[reports] general ledger: ${rows.length} group(s) over ${entries.length} entries`);

  return {
    groups: rows,
    summary: {
      groupCount: rows.length,
      totalDebit: fromScaled(totalDebit),
      totalCredit: fromScaled(totalCredit),
      difference: fromScaled(difference < 0n ? -difference : difference),
    },
    filters: {
      digits: query.digits,
      from: query.from?.toISOString() ?? null,
      to: query.to?.toISOString() ?? null,
      includeDetail: query.includeDetail,
    },
  };
}

/** Every entry with its transaction and account, in posting order. */
export async function journal(ctx: LedgerContext, query: JournalQuery) {
  return ctx.store.read(async (readers) => {
    const { rows: transactions } = await readers.transactions.list({ periodId: query.periodId });
    const entries = await readers.entries.listByTransactions(transactions.map((row) => row.id));
    const accounts = new Map((await readers.accounts.list()).map((account) => [account.id, account]));
    const byId = new Map(transactions.map((row) => [row.id, row]));

    return entries
      .flatMap((entry) => {
        const transaction = byId.get(entry.transactionId);
        const account = accounts.get(entry.accountId);
        if (!transaction || !account) return [];
        return [
          {
            entryId: entry.id,
            transactionId: transaction.id,
            occurredAt: transaction.occurredAt,
            description: transaction.description,
            direction: transaction.direction,
            accountCode: account.code,
            accountName: account.name,
            classification: account.classification,
            debit: entry.debit,
            credit: entry.credit,
          },
        ];
      })
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime());
  });
}

export async function invoiceStats(ctx: LedgerContext, query: InvoiceStatsQuery) {
  assertRange(query);
  const { rows } = await ctx.store.read((readers) => readers.invoices.list({ from: query.from, to: query.to }));

  const grandTotal = sumAmounts(rows.map((invoice) => invoice.grandTotal));
  return {
    count: rows.length,
    subtotal: sumAmounts(rows.map((invoice) => invoice.subtotal)),
    tax: sumAmounts(rows.map((invoice) => invoice.tax)),
    discount: sumAmounts(rows.map((invoice) => invoice.discount)),
    grandTotal,
    averageGrandTotal: fromScaled(rows.length > 0 ? divideRounded(toScaled(grandTotal), BigInt(rows.length)) : 0n),
  };
}

export interface TopClient {
  clientId: string;
  name: string;
  taxId: string | null;
  invoiceCount: number;
  totalAmount: string;
}

/** Clients ranked by the grand total they were invoiced in the range. */
export async function topClients(ctx: LedgerContext, query: TopClientsQuery): Promise<TopClient[]> {
  assertRange(query);

  const { invoices, clients } = await ctx.store.read(async (readers) => ({
    invoices: (await readers.invoices.list({ from: query.from, to: query.to })).rows,
    clients: await readers.clients.list(),
  }));

  const totals = new Map<string, { count: number; amount: bigint }>();
  for (const invoice of invoices) {
    if (!invoice.clientId) continue;
    const current = totals.get(invoice.clientId) ?? { count: 0, amount: 0n };
    current.count += 1;
    current.amount += toScaled(invoice.grandTotal);
    totals.set(invoice.clientId, current);
  }

  return clients
    .flatMap((client) => {
      const sums = totals.get(client.id);
      return sums ? [{ client, sums }] : [];
    })
    .sort((a, b) => (a.sums.amount === b.sums.amount ? 0 : a.sums.amount > b.sums.amount ? -1 : 1))
    .slice(0, query.limit)
    .map(({ client, sums }) => ({
      clientId: client.id,
      name: client.name,
      taxId: client.taxId,
      invoiceCount: sums.count,
      totalAmount: fromScaled(sums.amount),
    }));
}

/**
 * Debit and credit totals per account over the transactions of one period.
 * Only accounts with movements are listed.
 */
export async function periodBalance(ctx: LedgerContext, query: PeriodBalanceQuery) {
  const { period, accounts, entries } = await ctx.store.read(async (readers) => {
    const found = await readers.periods.findById(query.periodId);
    if (!found) throw new NotFoundError("Period", query.periodId);
    const { rows: transactions } = await readers.transactions.list({ periodId: found.id });
    return {
      period: found,
      accounts: await readers.accounts.list(),
      entries: await readers.entries.listByTransactions(transactions.map((row) => row.id)),
    };
  });

  const sums = new Map<string, { debit: bigint; credit: bigint }>();
  for (const entry of entries) {
    const current = sums.get(entry.accountId) ?? { debit: 0n, credit: 0n };
    current.debit += toScaled(entry.debit);
    current.credit += toScaled(entry.credit);
    sums.set(entry.accountId, current);
  }

  let totalDebit = 0n;
  let totalCredit = 0n;
  const rows: AccountMovement[] = [];
  for (const account of accounts) {
    const movement = sums.get(account.id);
    if (!movement) continue;
    totalDebit += movement.debit;
    totalCredit += movement.credit;
    rows.push({
      code: account.code,
      name: account.name,
      classification: account.classification,
      debit: fromScaled(movement.debit),
      credit: fromScaled(movement.credit),
      balance: fromScaled(movement.debit - movement.credit),
    });
  }

  return {
    periodId: period.id,
    startDate: period.startDate,
    endDate: period.endDate,
    accounts: rows,
    totals: { totalDebit: fromScaled(totalDebit), totalCredit: fromScaled(totalCredit) },
  };
}
