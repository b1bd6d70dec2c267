import { createExtractionConfig } from '../config/extraction.config';

export const testConfig = createExtractionConfig(new Date(Date.UTC(2026, 5, 1)));

export function htmlPage(head: string, body = ''): string {
  return `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;
}

export function nextDataScript(data: unknown): string {
  return `<script id="__NEXT_DATA__" type="application/json">${JSON.stringify(data)}</script>`;
}

export function sharedDataScript(key: string, content: string): string {
  return `<script type="application/json" data-zrr-shared-data-key="${key}"><!--${content}--></script>`;
}

export function apolloScript(data: unknown): string {
  return `<script id="hdpApolloPreloadedData" type="application/json">${JSON.stringify(data)}</script>`;
}

export function jsonLdScript(content: unknown): string {
  const body = typeof content === 'string' ? content : JSON.stringify(content);
  return `<script type="application/ld+json">${body}</script>`;
}

export const REDFIN_URL = 'https://www.redfin.com/OR/Springfield/742-Evergreen-Terrace/home/5551234';
export const ZILLOW_URL = 'https://www.zillow.com/homedetails/19-Birch-Ln-Boise-ID-83702/20001_zpid/';
export const OTHER_URL = 'https://homes.example.test/listing/88';

export const redfinNextData = {
  props: {
    pageProps: {
      initialRedux: {
        propertyId: 5551234,
        addressInfo: {
          streetLine: '742 Evergreen Terrace',
          unitNumber: null,
          city: 'Springfield',
          state: 'OR',
          zip: '97403',
          latitude: 44.05,
          longitude: -123.09,
        },
        price: { value: 450000 },
        beds: 3,
        baths: 2.5,
        sqFt: { value: 1800 },
        yearBuilt: 1987,
        photos: [
          { url: 'https://photos.example.test/1.jpg' },
          { url: 'https://photos.example.test/2.jpg' },
          { url: 'https://photos.example.test/1.jpg' },
        ],
      },
    },
  },
};

export const zillowProperty = {
  zpid: 20001,
  streetAddress: '19 Birch Lane',
  city: 'Boise',
  state: 'ID',
  zipcode: '83702',
  latitude: 43.61,
  longitude: -116.2,
  price: 525000,
  bedrooms: 4,
  bathrooms: 3,
  livingArea: 2100,
  yearBuilt: 2004,
  hiResImageLink: 'https://photos.example.test/z1.jpg',
  photos: [{ url: 'https://photos.example.test/z2.jpg' }],
};

export const schemaOrgResidence = {
  '@context': 'https://schema.org',
  '@type': 'SingleFamilyResidence',
  address: {
    '@type': 'PostalAddress',
    streetAddress: '88 Harbor View Rd',
    addressLocality: 'Portland',
    addressRegion: 'ME',
    postalCode: '04101',
  },
  numberOfRooms: 3,
  numberOfBathroomsTotal: 2,
  floorSize: { '@type': 'QuantitativeValue', value: 1500, unitCode: 'FTK' },
  geo: { '@type': 'GeoCoordinates', latitude: 43.66, longitude: -70.25 },
  image: [
    'https://photos.example.test/s1.jpg',
    { '@type': 'ImageObject', url: 'https://photos.example.test/s2.jpg' },
    'https://photos.example.test/s1.jpg',
  ],
  offers: { '@type': 'Offer', price: '$300,000', priceCurrency: 'USD' },
};
