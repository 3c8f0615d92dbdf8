import { describe, it, expect } from "vitest";
import { createTestContext, seedClient } from "../../../__tests__/helpers.js";
import { clientCreateSchema, clientUpdateSchema, listClientsQuerySchema } from "../schemas/clients.schemas.js";
import {
  clientStats,
  createClient,
  deleteClient,
  getClientByTaxId,
  listClients,
  updateClient,
} from "../services/clients.service.js";
import { invoiceCreateSchema } from "../../invoices/schemas/invoices.schemas.js";
import { createInvoice } from "../../invoices/services/invoices.service.js";
import { DuplicateKeyError, NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";

describe("clients", () => {
  it("stores optional fields as null", async () => {
    const { ctx } = createTestContext();
    const client = await seedClient(ctx);
    expect(client).toMatchObject({ name: "Acme Ltd", taxId: null, email: null, clientType: "company", isActive: true });
  });

  it("keeps tax ids unique", async () => {
    const { ctx } = createTestContext();
    await createClient(ctx, clientCreateSchema.parse({ name: "A", taxId: "TAX-1" }));
    await expect(createClient(ctx, clientCreateSchema.parse({ name: "B", taxId: "TAX-1" }))).rejects.toBeInstanceOf(
      DuplicateKeyError,
    );
  });

  it("blocks deleting a client with invoices and allows deactivating it", async () => {
    const { ctx } = createTestContext();
    const client = await seedClient(ctx);
    await createInvoice(ctx, invoiceCreateSchema.parse({ clientId: client.id }));

    await expect(deleteClient(ctx, client.id)).rejects.toBeInstanceOf(ReferentialIntegrityError);

    await updateClient(ctx, client.id, clientUpdateSchema.parse({ isActive: false }));
    const active = await listClients(ctx, listClientsQuerySchema.parse({ activeOnly: "1" }));
    expect(active).toEqual([]);
  });

  it("looks a client up by tax id", async () => {
    const { ctx } = createTestContext();
    const client = await createClient(ctx, clientCreateSchema.parse({ name: "Acme Ltd", taxId: "TAX-42" }));
    expect((await getClientByTaxId(ctx, "TAX-42")).id).toBe(client.id);
    await expect(getClientByTaxId(ctx, "TAX-43")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("counts clients by activity and type", async () => {
    const { ctx } = createTestContext();
    await seedClient(ctx);
    await seedClient(ctx, { name: "Globex", isActive: false });
    await createClient(ctx, clientCreateSchema.parse({ name: "Jane Doe" }));

    expect(await clientStats(ctx)).toEqual({ total: 3, active: 2, inactive: 1, individuals: 1, companies: 2 });
  });
});
