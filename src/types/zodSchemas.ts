import { z } from "zod";

/*
 * Raw PubMed records, keyed by the element names of the efetch XML.
 * Everything may be omitted or null: the extractors decide what a missing field means.
 */

export const RawAffiliationInfoSchema = z.object({
  Affiliation: z.string().nullish().describe("Free-text affiliation"),
});

export const RawAuthorSchema = z.object({
  LastName: z.string().nullish(),
  ForeName: z.string().nullish(),
  ValidYN: z.string().nullish().describe("Validity flag attribute, Y or N"),
  AffiliationInfo: z.array(RawAffiliationInfoSchema).nullish(),
});

export const RawPubDateSchema = z.object({
  Year: z.string().nullish(),
  Month: z.string().nullish(),
  Day: z.string().nullish(),
});

export const RawArticleSchema = z.object({
  ArticleTitle: z
    .array(z.string())
    .nullish()
    .describe("Text fragments of the title, nested markup included"),
  AuthorList: z.array(RawAuthorSchema).nullish(),
  Journal: z
    .object({
      JournalIssue: z
        .object({ PubDate: RawPubDateSchema.nullish() })
        .nullish(),
    })
    .nullish(),
});

export const RawArticleIdSchema = z.object({
  IdType: z.string().nullish(),
  value: z.string(),
});

export const RawPubmedArticleSchema = z.object({
  MedlineCitation: z
    .object({
      PMID: z.string().nullish(),
      Article: RawArticleSchema.nullish(),
    })
    .nullish(),
  PubmedData: z
    .object({ ArticleIdList: z.array(RawArticleIdSchema).nullish() })
    .nullish(),
});

export type RawAuthor = z.infer<typeof RawAuthorSchema>;
export type RawPubDate = z.infer<typeof RawPubDateSchema>;
export type RawArticleId = z.infer<typeof RawArticleIdSchema>;
export type RawPubmedArticle = z.infer<typeof RawPubmedArticleSchema>;
