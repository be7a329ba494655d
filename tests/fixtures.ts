import type { Article, Author } from '../src/types/domain.js'
import type { IArticleSource, IReportSink, ReportSummary, SearchOptions } from '../src/types/interfaces/pipeline.js'
import type { RawArticleId, RawAuthor, RawPubDate, RawPubmedArticle } from '../src/types/zodSchemas.js'

export const INDUSTRY_AFFILIATION = 'Acme Biotech Inc, Boston, MA, USA.'
export const ACADEMIC_AFFILIATION = 'Department of Chemistry, Example University, Leeds, UK.'

export function rawAuthor(
  foreName: string | undefined,
  lastName: string | undefined,
  affiliation?: string,
  validYN = 'N'
): RawAuthor {
  return {
    ForeName: foreName,
    LastName: lastName,
    ValidYN: validYN,
    AffiliationInfo: affiliation === undefined ? undefined : [{ Affiliation: affiliation }],
  }
}

export interface RawArticleInput {
  pmid?: string
  title?: string[]
  authors?: RawAuthor[]
  pubDate?: RawPubDate
  ids?: RawArticleId[]
}

export function rawArticle(input: RawArticleInput = {}): RawPubmedArticle {
  return {
    MedlineCitation: {
      PMID: input.pmid ?? '1',
      Article: {
        ArticleTitle: input.title ?? ['A test article'],
        AuthorList: input.authors ?? [],
        Journal: { JournalIssue: { PubDate: input.pubDate ?? { Year: '2021' } } },
      },
    },
    PubmedData: { ArticleIdList: input.ids ?? [] },
  }
}

export function industryRecord(pmid: string): RawPubmedArticle {
  return rawArticle({
    pmid,
    authors: [rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION), rawAuthor('Ravi', 'Patel', ACADEMIC_AFFILIATION)],
  })
}

export function academicRecord(pmid: string): RawPubmedArticle {
  return rawArticle({ pmid, authors: [rawAuthor('Ravi', 'Patel', ACADEMIC_AFFILIATION)] })
}

export function author(overrides: Partial<Author> = {}): Author {
  return {
    name: 'Jane Doe',
    affiliation: INDUSTRY_AFFILIATION,
    email: null,
    isCorresponding: false,
    ...overrides,
  }
}

export function article(overrides: Partial<Article> = {}): Article {
  const authors = overrides.industryAuthors ?? [author()]
  return {
    sourceId: '1',
    title: 'A test article',
    publicationDate: '2021',
    doi: '',
    allAuthors: authors,
    industryAuthors: authors,
    correspondingEmails: [],
    ...overrides,
  }
}

export class FakeSource implements IArticleSource {
  name = 'FakeSource'
  searches: Array<{ query: string; options?: SearchOptions }> = []

  constructor(
    private ids: string[],
    private records: RawPubmedArticle[],
    private failure?: { stage: 'search' | 'fetch'; error: Error }
  ) {}

  async search(query: string, options?: SearchOptions): Promise<string[]> {
    this.searches.push({ query, options })
    if (this.failure?.stage === 'search') throw this.failure.error
    return this.ids
  }

  async fetchRecords(): Promise<RawPubmedArticle[]> {
    if (this.failure?.stage === 'fetch') throw this.failure.error
    return this.records
  }
}

export class MemorySink implements IReportSink {
  name = 'MemorySink'
  written: Article[][] = []

  async write(articles: readonly Article[]): Promise<ReportSummary> {
    this.written.push([...articles])
    return { articlesWritten: articles.length, destination: 'memory' }
  }
}

export const ARTICLE_SET_XML = `<?xml version="1.0" ?>
<PubmedArticleSet>
<PubmedArticle>
  <MedlineCitation Status="MEDLINE" Owner="NLM">
    <PMID Version="1">10000001</PMID>
    <Article PubModel="Print">
      <Journal>
        <JournalIssue CitedMedium="Internet">
          <PubDate><Year>2021</Year><Month>Jun</Month><Day>15</Day></PubDate>
        </JournalIssue>
      </Journal>
      <ArticleTitle>Effect of <i>compound X</i> on CO<sub>2</sub> uptake.</ArticleTitle>
      <AuthorList CompleteYN="Y">
        <Author ValidYN="Y">
          <LastName>Doe</LastName>
          <ForeName>Jane</ForeName>
          <Initials>J</Initials>
          <AffiliationInfo>
            <Affiliation>Acme Biotech Inc, Boston, USA. jane.doe@acme-bio.com.</Affiliation>
          </AffiliationInfo>
        </Author>
        <Author ValidYN="N">
          <LastName>Roe</LastName>
          <ForeName>Richard</ForeName>
          <AffiliationInfo><Affiliation>Department of Chemistry, Example University.</Affiliation></AffiliationInfo>
          <AffiliationInfo><Affiliation>Johnson &amp; Johnson, New Brunswick</Affiliation></AffiliationInfo>
        </Author>
        <Author ValidYN="Y">
          <CollectiveName>Example Study Group</CollectiveName>
        </Author>
      </AuthorList>
    </Article>
  </MedlineCitation>
  <PubmedData>
    <ArticleIdList>
      <ArticleId IdType="pubmed">10000001</ArticleId>
      <ArticleId IdType="doi">10.1000/example.1</ArticleId>
    </ArticleIdList>
    <ReferenceList>
      <Reference>
        <ArticleIdList><ArticleId IdType="doi">10.1000/reference.9</ArticleId></ArticleIdList>
      </Reference>
    </ReferenceList>
  </PubmedData>
</PubmedArticle>
<PubmedArticle>
  <MedlineCitation Status="MEDLINE" Owner="NLM">
    <PMID Version="1">10000002</PMID>
  </MedlineCitation>
  <PubmedData><ArticleIdList/></PubmedData>
</PubmedArticle>
</PubmedArticleSet>`
