const PRODUCT_FIELDS = `
  id
  title
  handle
  description
  onlineStoreUrl
  images(first: 10) {
    edges {
      node {
        url
      }
    }
  }
  priceRange {
    minVariantPrice {
      amount
      currencyCode
    }
  }
`;

const ARTICLE_FIELDS = `
  id
  title
  handle
  excerpt
  content
  onlineStoreUrl
  blog {
    handle
  }
`;

export const SEARCH_QUERY = `
query Search($query: String!, $first: Int!) {
  products(first: $first, query: $query) {
    edges {
      node {${PRODUCT_FIELDS}}
    }
  }
  articles(first: $first, query: $query) {
    edges {
      node {${ARTICLE_FIELDS}}
    }
  }
}
`;

export const PRODUCT_BY_HANDLE_QUERY = `
query ProductByHandle($handle: String!) {
  product(handle: $handle) {${PRODUCT_FIELDS}}
}
`;

export const ARTICLE_BY_HANDLE_QUERY = `
query ArticleByHandle($query: String!) {
  articles(first: 1, query: $query) {
    edges {
      node {${ARTICLE_FIELDS}}
    }
  }
}
`;

export const FAQ_PAGE_LIMIT = 10;

export const FAQ_PAGES_QUERY = `
query FaqPages($first: Int!) {
  pages(first: $first, query: "title:FAQ") {
    edges {
      node {
        title
        body
      }
    }
  }
}
`;

// Storefront search syntax: quote the handle so hyphens stay literal.
export function articleHandleFilter(handle: string): string {
  return `handle:"${handle.replace(/["\\]/g, "")}"`;
}
