/**
 * Builders for efetch-shaped PubMed XML used across tests.
 * Pass `null` for a field to leave its element out.
 */

export interface FixtureAuthor {
  lastName?: string;
  initials?: string;
  collectiveName?: string;
}

export interface FixtureArticleId {
  idType: string;
  value: string;
}

export interface PubmedFixture {
  pmid: string;
  authors: FixtureAuthor[];
  title: string | null;
  journalTitle: string | null;
  isoAbbreviation: string | null;
  medlineTa: string | null;
  year: string | null;
  volume: string | null;
  issue: string | null;
  pages: string | null;
  articleIds: FixtureArticleId[];
}

export const DEFAULT_FIXTURE: PubmedFixture = {
  pmid: "20154675",
  authors: [
    { lastName: "Nepusz", initials: "T" },
    { lastName: "Sasidharan", initials: "R" },
    { lastName: "Paccanaro", initials: "A" },
  ],
  title: "SCPS: a fast implementation of a spectral method for detecting protein families on a genome-wide scale.",
  journalTitle: "BMC bioinformatics",
  isoAbbreviation: "BMC Bioinformatics",
  medlineTa: "BMC Bioinformatics",
  year: "2010",
  volume: "11",
  issue: null,
  pages: "120",
  articleIds: [
    { idType: "pubmed", value: "20154675" },
    { idType: "doi", value: "10.1186/1471-2105-11-120" },
    { idType: "pmc", value: "PMC2841596" },
  ],
};

function element(tag: string, value: string | null): string {
  return value === null ? "" : `<${tag}>${value}</${tag}>`;
}

function authorXml(author: FixtureAuthor): string {
  return [
    '<Author ValidYN="Y">',
    author.lastName !== undefined ? `<LastName>${author.lastName}</LastName>` : "",
    author.initials !== undefined ? `<Initials>${author.initials}</Initials>` : "",
    author.collectiveName !== undefined ? `<CollectiveName>${author.collectiveName}</CollectiveName>` : "",
    "</Author>",
  ].join("");
}

/** Render a single-article PubmedArticleSet. */
export function buildPubmedXml(overrides: Partial<PubmedFixture> = {}): string {
  const f: PubmedFixture = { ...DEFAULT_FIXTURE, ...overrides };
  return `<?xml version="1.0" ?>
<!DOCTYPE PubmedArticleSet PUBLIC "-//NLM//DTD PubMedArticle, 1st January 2019//EN" "https://dtd.nlm.nih.gov/ncbi/pubmed/out/pubmed_190101.dtd">
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation Status="MEDLINE" Owner="NLM">
      <PMID Version="1">${f.pmid}</PMID>
      <Article PubModel="Electronic">
        <Journal>
          <ISSN IssnType="Electronic">1471-2105</ISSN>
          <JournalIssue CitedMedium="Internet">
            ${element("Volume", f.volume)}
            ${element("Issue", f.issue)}
            <PubDate>${element("Year", f.year)}<Month>Mar</Month></PubDate>
          </JournalIssue>
          ${element("Title", f.journalTitle)}
          ${element("ISOAbbreviation", f.isoAbbreviation)}
        </Journal>
        ${element("ArticleTitle", f.title)}
        ${f.pages === null ? "" : `<Pagination><MedlinePgn>${f.pages}</MedlinePgn></Pagination>`}
        <AuthorList CompleteYN="Y">
          ${f.authors.map(authorXml).join("\n          ")}
        </AuthorList>
      </Article>
      <MedlineJournalInfo>
        <Country>England</Country>
        ${element("MedlineTA", f.medlineTa)}
      </MedlineJournalInfo>
    </MedlineCitation>
    <PubmedData>
      <ArticleIdList>
        ${f.articleIds.map((id) => `<ArticleId IdType="${id.idType}">${id.value}</ArticleId>`).join("\n        ")}
      </ArticleIdList>
    </PubmedData>
  </PubmedArticle>
</PubmedArticleSet>
`;
}
