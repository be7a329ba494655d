import { describe, expect, it } from 'vitest'
import {
  extractArticle,
  extractAuthor,
  findEmail,
  formatPublicationDate,
  formatTitle,
  tryExtractArticle,
} from '../src/pipeline/extract/index.js'
import { ACADEMIC_AFFILIATION, INDUSTRY_AFFILIATION, rawArticle, rawAuthor } from './fixtures.js'

describe('extractAuthor', () => {
  it('drops authors without a fore name or last name', () => {
    expect(extractAuthor(rawAuthor(undefined, 'Doe', INDUSTRY_AFFILIATION))).toBeNull()
    expect(extractAuthor(rawAuthor('Jane', undefined, INDUSTRY_AFFILIATION))).toBeNull()
  })

  it('builds the author from names, affiliation and email', () => {
    const author = extractAuthor(
      rawAuthor('Jane', 'Doe', 'Acme Biotech Inc, Boston, MA, USA. jane.doe@acme-bio.com.')
    )

    expect(author).toEqual({
      name: 'Jane Doe',
      affiliation: 'Acme Biotech Inc, Boston, MA, USA. jane.doe@acme-bio.com.',
      email: 'jane.doe@acme-bio.com',
      isCorresponding: false,
    })
    expect(Object.isFrozen(author)).toBe(true)
  })

  it('uses only the first affiliation block', () => {
    const author = extractAuthor({
      ForeName: 'Jane',
      LastName: 'Doe',
      AffiliationInfo: [{ Affiliation: 'First Labs Ltd' }, { Affiliation: 'Second University' }],
    })
    expect(author?.affiliation).toBe('First Labs Ltd')
  })

  it('degrades missing affiliation data to empty values', () => {
    expect(extractAuthor(rawAuthor('Jane', 'Doe'))).toEqual({
      name: 'Jane Doe',
      affiliation: '',
      email: null,
      isCorresponding: false,
    })
    expect(extractAuthor({ ForeName: 'Jane', LastName: 'Doe', AffiliationInfo: [{}] })?.affiliation).toBe('')
  })

  it('marks corresponding authors by validity flag or affiliation text', () => {
    expect(extractAuthor(rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION, 'Y'))?.isCorresponding).toBe(true)
    expect(
      extractAuthor(rawAuthor('Jane', 'Doe', 'CORRESPONDING author: Acme Labs Ltd', 'N'))?.isCorresponding
    ).toBe(true)
    expect(extractAuthor(rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION, 'N'))?.isCorresponding).toBe(false)
  })
})

describe('findEmail', () => {
  it('returns the first email-shaped substring', () => {
    expect(findEmail('Contact a.one@example.org; b.two@example.net')).toBe('a.one@example.org')
  })

  it('requires a top-level label of two letters or more', () => {
    expect(findEmail('reach me at someone@host.c')).toBeNull()
    expect(findEmail('no address here')).toBeNull()
  })
})

describe('formatPublicationDate', () => {
  it('keeps the parts down to the first missing one', () => {
    expect(formatPublicationDate({ Year: '2021' })).toBe('2021')
    expect(formatPublicationDate({ Year: '2021', Month: '06', Day: '15' })).toBe('2021-06-15')
    expect(formatPublicationDate({ Year: '2021', Month: 'Jun' })).toBe('2021-Jun')
    expect(formatPublicationDate({ Year: '2021', Day: '15' })).toBe('2021')
  })

  it('falls back to a placeholder without a year', () => {
    expect(formatPublicationDate({ Month: '06', Day: '15' })).toBe('Date not available')
    expect(formatPublicationDate(undefined)).toBe('Date not available')
  })
})

describe('formatTitle', () => {
  it('joins title fragments with single spaces', () => {
    expect(formatTitle(['Effect of ', 'compound X', ' on   outcomes '])).toBe('Effect of compound X on outcomes')
  })

  it('falls back to a placeholder', () => {
    expect(formatTitle(undefined)).toBe('No title available')
    expect(formatTitle([' ', '\n'])).toBe('No title available')
  })
})

describe('extractArticle', () => {
  it('discards articles whose authors are all academic', () => {
    const raw = rawArticle({
      authors: [rawAuthor('Ravi', 'Patel', ACADEMIC_AFFILIATION), rawAuthor('Mia', 'Stone', '')],
    })

    expect(extractArticle(raw)).toBeNull()
    expect(tryExtractArticle(raw)).toEqual({ status: 'excluded', sourceId: '1', reason: 'no-industry-authors' })
  })

  it('keeps the industry authors in source order', () => {
    const article = extractArticle(
      rawArticle({
        authors: [
          rawAuthor('Ravi', 'Patel', ACADEMIC_AFFILIATION),
          rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION),
          rawAuthor(undefined, 'Nameless', INDUSTRY_AFFILIATION),
          rawAuthor('Mia', 'Stone', 'Clinic of Example'),
          rawAuthor('Tom', 'Grey', 'Sanofi, Paris'),
        ],
      })
    )

    expect(article?.allAuthors.map((a) => a.name)).toEqual(['Ravi Patel', 'Jane Doe', 'Mia Stone', 'Tom Grey'])
    expect(article?.industryAuthors.map((a) => a.name)).toEqual(['Jane Doe', 'Tom Grey'])
  })

  it('selects only the industry author from a mixed pair', () => {
    const article = extractArticle(
      rawArticle({
        authors: [rawAuthor('Ravi', 'Patel', ACADEMIC_AFFILIATION), rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION)],
      })
    )
    expect(article?.industryAuthors).toEqual([
      { name: 'Jane Doe', affiliation: INDUSTRY_AFFILIATION, email: null, isCorresponding: false },
    ])
  })

  it('extracts title, date and the first DOI', () => {
    const article = extractArticle(
      rawArticle({
        pmid: '30000001',
        title: ['Trial of ', 'drug Y'],
        pubDate: { Year: '2020', Month: 'Mar' },
        authors: [rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION)],
        ids: [
          { IdType: 'pubmed', value: '30000001' },
          { IdType: 'doi', value: '10.1000/test.1' },
          { IdType: 'doi', value: '10.1000/test.2' },
        ],
      })
    )

    expect(article).toMatchObject({
      sourceId: '30000001',
      title: 'Trial of drug Y',
      publicationDate: '2020-Mar',
      doi: '10.1000/test.1',
    })
    expect(Object.isFrozen(article)).toBe(true)
  })

  it('leaves the DOI empty when none is listed', () => {
    const article = extractArticle(
      rawArticle({
        authors: [rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION)],
        ids: [{ IdType: 'pmc', value: 'PMC000001' }],
      })
    )
    expect(article?.doi).toBe('')
  })

  it('collects unique corresponding-author emails', () => {
    const article = extractArticle(
      rawArticle({
        authors: [
          rawAuthor('Jane', 'Doe', 'Acme Labs Ltd. shared@acme.test', 'Y'),
          rawAuthor('Tom', 'Grey', 'Acme Labs Ltd. shared@acme.test', 'Y'),
          rawAuthor('Ravi', 'Patel', 'Example University. ravi@uni.test', 'Y'),
          rawAuthor('Mia', 'Stone', 'Acme Labs Ltd. mia@acme.test', 'N'),
        ],
      })
    )
    expect(article?.correspondingEmails).toEqual(['shared@acme.test', 'ravi@uni.test'])
  })

  it('treats null author fields as missing without losing sibling authors', () => {
    const result = tryExtractArticle(
      rawArticle({
        authors: [
          rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION),
          { ForeName: 'Ravi', LastName: 'Patel', ValidYN: null, AffiliationInfo: [{ Affiliation: null }] },
          { ForeName: null, LastName: 'Stone', AffiliationInfo: [{ Affiliation: INDUSTRY_AFFILIATION }] },
        ],
      })
    )

    expect(result.status).toBe('included')
    if (result.status === 'included') {
      expect(result.article.allAuthors).toEqual([
        { name: 'Jane Doe', affiliation: INDUSTRY_AFFILIATION, email: null, isCorresponding: false },
        { name: 'Ravi Patel', affiliation: '', email: null, isCorresponding: false },
      ])
      expect(result.article.industryAuthors.map((a) => a.name)).toEqual(['Jane Doe'])
    }
  })

  it('treats null date parts and identifier types as missing', () => {
    const article = extractArticle(
      rawArticle({
        authors: [rawAuthor('Jane', 'Doe', INDUSTRY_AFFILIATION)],
        pubDate: { Year: '2020', Month: null, Day: '3' },
        ids: [
          { IdType: null, value: '10.1000/untyped' },
          { IdType: 'doi', value: '10.1000/typed' },
        ],
      })
    )

    expect(article).toMatchObject({ publicationDate: '2020', doi: '10.1000/typed' })
    expect(tryExtractArticle({ MedlineCitation: { PMID: '5', Article: null } })).toEqual({
      status: 'skipped',
      sourceId: '5',
      reason: 'missing Article',
    })
  })

  it('skips records without the citation or article block', () => {
    expect(tryExtractArticle({ PubmedData: {} })).toEqual({
      status: 'skipped',
      sourceId: '',
      reason: 'missing MedlineCitation',
    })
    expect(tryExtractArticle({ MedlineCitation: { PMID: '42' } })).toEqual({
      status: 'skipped',
      sourceId: '42',
      reason: 'missing Article',
    })
  })

  it('skips records with an unexpected shape instead of throwing', () => {
    const result = tryExtractArticle({ MedlineCitation: { PMID: '7', Article: { AuthorList: 'not a list' } } })

    expect(result.status).toBe('skipped')
    expect(result).toMatchObject({ sourceId: '7' })
    expect(result.status === 'skipped' && result.reason.startsWith('malformed record')).toBe(true)
    expect(extractArticle(null)).toBeNull()
  })
})
