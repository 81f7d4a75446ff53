import { z } from 'zod';

const AmountTextSchema = z.union([z.string(), z.number()]);
const ReferenceSchema = z.union([z.string(), z.number()]).nullish();

export const OracleBalanceSchema = z
  .object({
    betrag_original: AmountTextSchema.nullish(),
    betrag_text: AmountTextSchema.nullish(),
    betrag: AmountTextSchema.nullish(),
    betrag_nummer: AmountTextSchema.nullish(),
    datum: z.string().nullish(),
    referenz_auszug: ReferenceSchema,
  })
  .passthrough();

export type OracleBalanceDTO = z.infer<typeof OracleBalanceSchema>;

export const OracleTransactionSchema = z
  .object({
    datum: z.string().nullish(),
    valuta: z.string().nullish(),
    beschreibung: z.string().nullish(),
    betrag_original: AmountTextSchema.nullish(),
    betrag_text: AmountTextSchema.nullish(),
    betrag: AmountTextSchema.nullish(),
    betrag_nummer: AmountTextSchema.nullish(),
    kategorie: z.string().nullish(),
  })
  .passthrough();

export type OracleTransactionDTO = z.infer<typeof OracleTransactionSchema>;

// Transactions stay `unknown` here so one malformed entry cannot reject the whole statement.
export const OracleStatementSchema = z
  .object({
    auszug_nummer: ReferenceSchema,
    zeitraum: z
      .object({
        von: z.string().nullish(),
        bis: z.string().nullish(),
      })
      .nullish(),
    anfangssaldo: OracleBalanceSchema,
    endsaldo: OracleBalanceSchema,
    transaktionen: z.array(z.unknown()).nullish(),
    validierung: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type OracleStatementDTO = z.infer<typeof OracleStatementSchema>;
