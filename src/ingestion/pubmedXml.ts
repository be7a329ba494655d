import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import { hasChildren, isText, type AnyNode, type Element } from "domhandler";
import type {
    RawArticleId,
    RawAuthor,
    RawPubDate,
    RawPubmedArticle,
} from "../types/zodSchemas.js";

type Selection = Cheerio<Element>;

function optionalText(selection: Selection): string | undefined {
    return selection.length > 0 ? selection.first().text() : undefined;
}

/** Text nodes under `node` in document order, markup stripped. */
export function textFragments(node: AnyNode): string[] {
    if (isText(node)) return [node.data];
    if (!hasChildren(node)) return [];
    return node.children.flatMap(textFragments);
}

function decodeAuthor($: cheerio.CheerioAPI, author: Selection): RawAuthor {
    return {
        LastName: optionalText(author.children("LastName")),
        ForeName: optionalText(author.children("ForeName")),
        ValidYN: author.attr("ValidYN"),
        AffiliationInfo: author
            .children("AffiliationInfo")
            .toArray()
            .map((info) => ({ Affiliation: optionalText($(info).children("Affiliation")) })),
    };
}

function decodePubDate(pubDate: Selection): RawPubDate | undefined {
    if (pubDate.length === 0) return undefined;
    return {
        Year: optionalText(pubDate.children("Year")),
        Month: optionalText(pubDate.children("Month")),
        Day: optionalText(pubDate.children("Day")),
    };
}

function decodeArticle($: cheerio.CheerioAPI, pubmedArticle: Selection): RawPubmedArticle {
    const citation = pubmedArticle.children("MedlineCitation").first();
    const article = citation.children("Article").first();
    const title = article.children("ArticleTitle").toArray();

    const ids: RawArticleId[] = pubmedArticle
        .find("PubmedData > ArticleIdList > ArticleId")
        .toArray()
        .map((id) => ({ IdType: $(id).attr("IdType"), value: $(id).text().trim() }));

    return {
        MedlineCitation:
            citation.length === 0
                ? undefined
                : {
                      PMID: optionalText(citation.children("PMID"))?.trim(),
                      Article:
                          article.length === 0
                              ? undefined
                              : {
                                    ArticleTitle: title.length > 0 ? title.flatMap(textFragments) : undefined,
                                    AuthorList: article
                                        .find("AuthorList > Author")
                                        .toArray()
                                        .map((author) => decodeAuthor($, $(author))),
                                    Journal: {
                                        JournalIssue: {
                                            PubDate: decodePubDate(
                                                article.find("Journal > JournalIssue > PubDate").first(),
                                            ),
                                        },
                                    },
                                },
                  },
        PubmedData: { ArticleIdList: ids },
    };
}

/**
 * Decodes an efetch `PubmedArticleSet` document into raw records,
 * one per `PubmedArticle`, keeping only the fields the extractors read.
 */
export function parsePubmedArticleSet(xml: string): RawPubmedArticle[] {
    const $ = cheerio.load(xml, { xml: true });
    return $("PubmedArticle")
        .toArray()
        .map((element) => decodeArticle($, $(element)));
}
