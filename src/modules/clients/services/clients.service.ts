import type { LedgerContext } from "../../../types.js";
import { NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";
import type {
  ClientCreatePayload,
  ClientUpdatePayload,
  ListClientsQuery,
} from "../schemas/clients.schemas.js";

export async function createClient(ctx: LedgerContext, payload: ClientCreatePayload) {
  return ctx.store.write((uow) =>
    uow.clients.insert({
      name: payload.name,
      taxId: payload.taxId ?? null,
      address: payload.address ?? null,
      phone: payload.phone ?? null,
      email: payload.email ?? null,
      clientType: payload.clientType,
      notes: payload.notes ?? null,
      isActive: payload.isActive,
    }),
  );
}

export async function getClient(ctx: LedgerContext, id: string) {
  const client = await ctx.store.read((readers) => readers.clients.findById(id));
  if (!client) throw new NotFoundError("Client", id);
  return client;
}

export async function getClientByTaxId(ctx: LedgerContext, taxId: string) {
  const client = await ctx.store.read((readers) => readers.clients.findByTaxId(taxId));
  if (!client) throw new NotFoundError("Client", taxId);
  return client;
}

export async function listClients(ctx: LedgerContext, query: ListClientsQuery) {
  return ctx.store.read((readers) => readers.clients.list(query));
}

export async function updateClient(ctx: LedgerContext, id: string, payload: ClientUpdatePayload) {
  return ctx.store.write(async (uow) => {
    const current = await uow.clients.lockForUpdate(id);
    if (!current) throw new NotFoundError("Client", id);
    const updated = await uow.clients.update(id, payload);
    if (!updated) throw new NotFoundError("Client", id);
    return updated;
  });
}

/** Deactivate instead when the client has invoices. */
export async function deleteClient(ctx: LedgerContext, id: string) {
  await ctx.store.write(async (uow) => {
    const current = await uow.clients.lockForUpdate(id);
    if (!current) throw new NotFoundError("Client", id);

    const references = await uow.invoices.countByClient(id);
    if (references > 0) throw new ReferentialIntegrityError("Client", id, "Invoice", references);

    await uow.clients.delete(id);
  });
  return { id, deleted: true };
}

export async function clientStats(ctx: LedgerContext) {
  const clients = await ctx.store.read((readers) => readers.clients.list());
  const active = clients.filter((client) => client.isActive).length;
  return {
    total: clients.length,
    active,
    inactive: clients.length - active,
    individuals: clients.filter((client) => client.clientType === "individual").length,
    companies: clients.filter((client) => client.clientType === "company").length,
  };
}
