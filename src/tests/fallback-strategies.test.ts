import { PageDocument } from '../services/page-document';
import { SchemaOrgStrategy } from '../services/extraction-strategies/schema-org.strategy';
import { TextPatternStrategy } from '../services/extraction-strategies/text-pattern.strategy';
import { htmlPage, jsonLdScript, OTHER_URL, schemaOrgResidence, testConfig } from './fixtures';

describe('SchemaOrgStrategy', () => {
  const strategy = new SchemaOrgStrategy(testConfig);

  it('maps a residence node with offers, address, geo and images', () => {
    const page = new PageDocument(htmlPage(jsonLdScript(schemaOrgResidence)), OTHER_URL);

    expect(strategy.extract(page)).toEqual({
      sourcePlatform: 'unknown',
      externalId: null,
      address: {
        street: '88 Harbor View Rd',
        unit: null,
        city: 'Portland',
        region: 'ME',
        postalCode: '04101',
      },
      latitude: 43.66,
      longitude: -70.25,
      listPrice: 300000,
      bedroomCount: 3,
      bathroomCount: 2,
      interiorArea: 1500,
      yearBuilt: null,
      photoUrls: ['https://photos.example.test/s1.jpg', 'https://photos.example.test/s2.jpg'],
    });
  });

  it('skips malformed blocks and takes the first priced offer from a list', () => {
    const listing = {
      '@type': 'RealEstateListing',
      offers: [
        { '@type': 'Offer', price: 0 },
        { '@type': 'Offer', lowPrice: 275000 },
      ],
    };
    const page = new PageDocument(htmlPage(jsonLdScript('{oops') + jsonLdScript(listing)), OTHER_URL);

    expect(strategy.extract(page).listPrice).toBe(275000);
  });

  it('ignores nodes whose type is not a listing type', () => {
    const organization = { '@type': 'Organization', numberOfRooms: 12, offers: { price: 99 } };
    const record = strategy.extract(new PageDocument(htmlPage(jsonLdScript(organization)), OTHER_URL));

    expect(record.bedroomCount).toBeNull();
    expect(record.listPrice).toBeNull();
  });

  it('keeps at most 50 distinct images in document order', () => {
    const urls = Array.from({ length: 60 }, (_, i) => `https://photos.example.test/p${i}.jpg`);
    const residence = { ...schemaOrgResidence, image: [urls[0], { url: urls[1] }, ...urls] };
    const page = new PageDocument(htmlPage(jsonLdScript(residence)), OTHER_URL);

    expect(strategy.extract(page).photoUrls).toEqual(urls.slice(0, 50));
  });
});

describe('TextPatternStrategy', () => {
  const strategy = new TextPatternStrategy(testConfig);

  it('recovers counts, area and year from visible text', () => {
    const page = new PageDocument(htmlPage('', '<p>3 beds, 2 baths, 1,200 sqft, Year Built: 1998</p>'), OTHER_URL);
    const record = strategy.extract(page);

    expect(record.listPrice).toBeNull();
    expect(record.bedroomCount).toBe(3);
    expect(record.bathroomCount).toBe(2);
    expect(record.interiorArea).toBe(1200);
    expect(record.yearBuilt).toBe(1998);
  });

  it('takes the first dollar amount as the price', () => {
    const page = new PageDocument(htmlPage('', '<h1>Listed at $1,250,000</h1><p>HOA $350</p>'), OTHER_URL);

    expect(strategy.extract(page).listPrice).toBe(1250000);
  });

  it('rejects implausible years and ignores script contents', () => {
    const html = htmlPage('<script>var note = "4 beds";</script>', '<p>Year built: 1650</p>');
    const record = strategy.extract(new PageDocument(html, OTHER_URL));

    expect(record.yearBuilt).toBeNull();
    expect(record.bedroomCount).toBeNull();
  });
});
