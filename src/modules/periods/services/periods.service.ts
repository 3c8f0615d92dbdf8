import type { LedgerContext } from "../../../types.js";
import { ConstraintViolation, NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";
import type {
  ListPeriodsQuery,
  PeriodCreatePayload,
  PeriodUpdatePayload,
} from "../schemas/periods.schemas.js";

function assertRange(startDate: Date, endDate: Date) {
  if (startDate.getTime() > endDate.getTime()) {
    throw new ConstraintViolation("Period start date must not be after its end date", {
      startDate: startDate.toISOString(),
      endDate: endDate.toISOString(),
    });
  }
}

export async function createPeriod(ctx: LedgerContext, payload: PeriodCreatePayload) {
  assertRange(payload.startDate, payload.endDate);
  return ctx.store.write((uow) => uow.periods.insert(payload));
}

export async function getPeriod(ctx: LedgerContext, id: string) {
  const period = await ctx.store.read((readers) => readers.periods.findById(id));
  if (!period) throw new NotFoundError("Period", id);
  return period;
}

export async function listPeriods(ctx: LedgerContext, query: ListPeriodsQuery = {}) {
  return ctx.store.read((readers) => readers.periods.list(query));
}

// State changes are recorded but not enforced against postings.
export async function updatePeriod(ctx: LedgerContext, id: string, payload: PeriodUpdatePayload) {
  return ctx.store.write(async (uow) => {
    const current = await uow.periods.lockForUpdate(id);
    if (!current) throw new NotFoundError("Period", id);
    assertRange(payload.startDate ?? current.startDate, payload.endDate ?? current.endDate);

    const updated = await uow.periods.update(id, payload);
    if (!updated) throw new NotFoundError("Period", id);
    return updated;
  });
}

export async function deletePeriod(ctx: LedgerContext, id: string) {
  await ctx.store.write(async (uow) => {
    const current = await uow.periods.lockForUpdate(id);
    if (!current) throw new NotFoundError("Period", id);

    const references = await uow.transactions.countByPeriod(id);
    if (references > 0) throw new ReferentialIntegrityError("Period", id, "Transaction", references);

    await uow.periods.delete(id);
  });
  return { id, deleted: true };
}
