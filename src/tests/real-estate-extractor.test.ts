import { RealEstateExtractorService } from '../services/real-estate-extractor.service';
import { backfill, createEmptyRecord } from '../services/record-merge';
import {
  htmlPage,
  jsonLdScript,
  nextDataScript,
  OTHER_URL,
  REDFIN_URL,
  redfinNextData,
  schemaOrgResidence,
  sharedDataScript,
  testConfig,
  ZILLOW_URL,
} from './fixtures';

describe('RealEstateExtractorService', () => {
  const extractor = new RealEstateExtractorService(testConfig);

  it('classifies by URL substring', () => {
    expect(extractor.classify(REDFIN_URL)).toBe('redfin');
    expect(extractor.classify(ZILLOW_URL)).toBe('zillow');
    expect(extractor.classify(OTHER_URL)).toBe('unknown');
  });

  it('lists strategies in run order', () => {
    expect(extractor.getRegisteredStrategies()).toEqual(['Redfin', 'Zillow', 'SchemaOrg', 'TextPattern']);
  });

  it('uses only the platform strategy when it finds every core field', () => {
    const outcome = extractor.extractListing(htmlPage(nextDataScript(redfinNextData)), REDFIN_URL);

    expect(outcome.classifiedAs).toBe('redfin');
    expect(outcome.strategiesUsed).toEqual(['Redfin']);
    expect(outcome.record.listPrice).toBe(450000);
    expect(outcome.record.interiorArea).toBe(1800);
  });

  it('falls back to schema.org markup when no platform data exists', () => {
    const outcome = extractor.extractListing(htmlPage(jsonLdScript(schemaOrgResidence)), OTHER_URL);

    expect(outcome.classifiedAs).toBe('unknown');
    expect(outcome.strategiesUsed).toEqual(['Redfin', 'Zillow', 'SchemaOrg']);
    expect(outcome.record.sourcePlatform).toBe('redfin');
    expect(outcome.record.listPrice).toBe(300000);
    expect(outcome.record.interiorArea).toBe(1500);
  });

  it('recovers fields from visible text alone', () => {
    const html = htmlPage('', '<p>3 beds, 2 baths, 1,200 sqft, Year Built: 1998</p>');
    const outcome = extractor.extractListing(html, ZILLOW_URL);

    // The Zillow strategy already recovers the area, so schema.org is skipped
    expect(outcome.strategiesUsed).toEqual(['Zillow', 'TextPattern']);
    expect(outcome.record).toMatchObject({
      sourcePlatform: 'zillow',
      listPrice: null,
      bedroomCount: 3,
      bathroomCount: 2,
      interiorArea: 1200,
      yearBuilt: 1998,
    });
  });

  it('keeps the richer result for an unclassified page', () => {
    const html = htmlPage(
      sharedDataScript('hdp', JSON.stringify({ bedrooms: 5 })) + nextDataScript(redfinNextData)
    );
    const outcome = extractor.extractListing(html, OTHER_URL);

    expect(outcome.strategiesUsed).toEqual(['Redfin', 'Zillow']);
    expect(outcome.record.sourcePlatform).toBe('redfin');
    expect(outcome.record.bedroomCount).toBe(3);
    expect(outcome.record.interiorArea).toBe(1800);
  });

  it('prefers the first registered platform on a tie', () => {
    const outcome = extractor.extractListing(htmlPage(nextDataScript({ home: { beds: 2 } })), OTHER_URL);

    expect(outcome.record.sourcePlatform).toBe('redfin');
    expect(outcome.strategiesUsed).toEqual(['Redfin', 'Zillow', 'TextPattern']);
  });

  it('keeps the first platform label when nothing on the page is recognizable', () => {
    const outcome = extractor.extractListing(htmlPage('', '<p>Nothing here</p>'), OTHER_URL);

    expect(outcome.classifiedAs).toBe('unknown');
    expect(outcome.strategiesUsed).toEqual(['Redfin', 'Zillow', 'SchemaOrg', 'TextPattern']);
    expect(outcome.record).toEqual(createEmptyRecord('redfin'));
  });

  it('never overwrites a field the platform strategy already set', () => {
    const html = htmlPage(
      nextDataScript({ home: { price: 450000, beds: 3 } }),
      '<p>Asking $999,999</p><p>5 beds</p><p>4 baths</p><p>3,000 sq ft</p>'
    );
    const outcome = extractor.extractListing(html, REDFIN_URL);

    expect(outcome.strategiesUsed).toEqual(['Redfin', 'TextPattern']);
    expect(outcome.record.listPrice).toBe(450000);
    expect(outcome.record.bedroomCount).toBe(3);
    expect(outcome.record.bathroomCount).toBe(4);
    expect(outcome.record.interiorArea).toBe(3000);
  });
});

describe('backfill', () => {
  it('fills only null fields and adopts photos only when there are none', () => {
    const target = { ...createEmptyRecord('redfin'), listPrice: 1, photoUrls: ['a'] };
    target.address = { ...target.address, city: 'X' };
    const donor = { ...createEmptyRecord('unknown'), listPrice: 2, bedroomCount: 3, photoUrls: ['b'] };
    donor.address = { ...donor.address, city: 'Y', street: 'S' };

    const merged = backfill(target, donor);

    expect(merged.sourcePlatform).toBe('redfin');
    expect(merged.listPrice).toBe(1);
    expect(merged.bedroomCount).toBe(3);
    expect(merged.photoUrls).toEqual(['a']);
    expect(merged.address.city).toBe('X');
    expect(merged.address.street).toBe('S');
    expect(backfill(createEmptyRecord('zillow'), donor).photoUrls).toEqual(['b']);
  });

  it('does not mutate its inputs', () => {
    const target = createEmptyRecord('redfin');
    backfill(target, { ...createEmptyRecord('unknown'), listPrice: 5 });
    expect(target.listPrice).toBeNull();
  });
});
