/**
 * Entry of a news sitemap
 */
export interface SitemapArticle {
  url: string;
  title: string;

  /**
   * Raw `news:publication_date` value, empty when absent
   */
  publicationDate: string;

  keywords: string[];
}
