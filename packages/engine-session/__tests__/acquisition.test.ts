import { describe, it, expect } from 'vitest';
import { EXCAVATOR, findPoorExcavator, makeMarket, tickThrough } from './fixtures.js';

describe('requestSearch', () => {
  it('debits the retainer and schedules the search', () => {
    const { market, ledger } = makeMarket();
    const result = market.requestSearch('player-1', EXCAVATOR, 3, 2);
    expect(result.success).toBe(true);
    if (!result.success) return;
    // Regional: 1000 + 0.5% of 200000; duration 1 + floor(0.5 * 2) = 2 months
    expect(result.data.fee_paid).toBe(2000);
    expect(result.data.ttl_hours).toBe(48);
    expect(result.data.status).toBe('active');
    expect(ledger.balance('player-1')).toBe(498000);
  });

  it('falls back to tier 2 for malformed tiers', () => {
    const { market } = makeMarket();
    const result = market.requestSearch('player-1', EXCAVATOR, 7, 9);
    expect(result.success && result.data.quality_tier).toBe(2);
    expect(result.success && result.data.agent_tier).toBe(2);
  });

  it('allows at most five active searches per requester', () => {
    const { market, ledger } = makeMarket();
    for (let i = 0; i < 5; i++) {
      expect(market.requestSearch('player-1', EXCAVATOR, 3, 1).success).toBe(true);
    }
    const sixth = market.requestSearch('player-1', EXCAVATOR, 3, 1);
    expect(sixth.success).toBe(false);
    expect(!sixth.success && sixth.error.code).toBe('VALIDATION_ERROR');
    expect(ledger.balance('player-1')).toBe(500000 - 5 * 500);
  });

  it('rolls back when the retainer cannot be paid', () => {
    const { market, notifier } = makeMarket({ 'player-1': 100 });
    const result = market.requestSearch('player-1', EXCAVATOR, 3, 1);
    expect(!result.success && result.error.code).toBe('FUNDS_ERROR');
    expect(market.getActiveSearches('player-1')).toEqual([]);
    expect(notifier.last()).toEqual({
      owner_id: 'player-1',
      message: 'Cannot pay the $500 search retainer',
      severity: 'critical',
    });
  });

  it('rejects a non-positive base price', () => {
    const { market } = makeMarket();
    const result = market.requestSearch('player-1', { ...EXCAVATOR, base_price: 0 }, 3, 1);
    expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
  });
});

describe('search resolution', () => {
  it('turns up found listings with commission on top', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    const view = fixture.market.getListing(listingId);
    expect(view?.status).toBe('found');
    expect(view?.owner_id).toBe('player-1');
    expect(view?.generation).toBe('MID_AGE');
    expect(view?.age_years).toBe(6);
    expect(view?.operating_hours).toBe(4200);
    expect(view?.asking_price).toBe(53136);
    expect(view?.ttl_hours).toBe(72);
    expect(view?.ttl_started).toBe(false);
    expect(view?.hidden).toEqual({});
    expect(fixture.market.getStatistics('player-1').current.listings_found).toBe(1);
  });

  it('drops an unsuccessful search', () => {
    const { market, notifier } = makeMarket();
    const search = market.requestSearch('player-1', EXCAVATOR, 1, 1);
    expect(search.success).toBe(true);
    // Local + Poor = 0.40; the 0.5 fallback roll misses
    tickThrough(market, 1, 24);
    expect(market.getActiveSearches('player-1')).toEqual([]);
    expect(market.getActiveListings()).toEqual([]);
    expect(notifier.last()?.message).toBe('Agent found no Excavator for sale');
    expect(market.getStatistics('player-1').current.searches_failed).toBe(1);
  });

  it('does not start the offer window until the listing is viewed', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    tickThrough(fixture.market, 25, 30);
    expect(fixture.market.getListing(listingId)?.ttl_hours).toBe(72);

    fixture.market.viewListing(listingId, 'player-1');
    tickThrough(fixture.market, 31, 33);
    expect(fixture.market.getListing(listingId)?.ttl_hours).toBe(69);
  });

  it('expires a found listing when its window runs out and drops the search', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    fixture.market.viewListing(listingId, 'player-1');
    tickThrough(fixture.market, 25, 96);
    expect(fixture.market.getListing(listingId)).toBeUndefined();
    expect(fixture.market.getActiveSearches('player-1')).toEqual([]);
  });

  it('keeps the retainer when a search is cancelled', () => {
    const { market, ledger } = makeMarket();
    const search = market.requestSearch('player-1', EXCAVATOR, 3, 1);
    if (!search.success) throw new Error(search.error.message);
    const cancelled = market.cancelSearch(search.data.search_id, 'player-1');
    expect(cancelled.success).toBe(true);
    expect(ledger.balance('player-1')).toBe(499500);
    expect(market.getActiveSearches()).toEqual([]);
    expect(market.cancelSearch(search.data.search_id, 'player-1').success).toBe(false);
  });
});

describe('renewSearch', () => {
  it('starts a new search on the same terms for a new retainer', () => {
    const fixture = makeMarket();
    const { market, ledger } = fixture;
    findPoorExcavator(fixture);
    const before = ledger.balance('player-1');

    const renewed = market.renewSearch('id-1', 'player-1');
    expect(renewed.success).toBe(true);
    if (!renewed.success) return;
    expect(renewed.data.search_id).toBe('id-3');
    expect(renewed.data.item_name).toBe('Excavator');
    expect(renewed.data.base_price).toBe(200000);
    expect(renewed.data.quality_tier).toBe(1);
    expect(renewed.data.agent_tier).toBe(1);
    expect(renewed.data.status).toBe('active');
    expect(renewed.data.created_at_hour).toBe(24);
    expect(renewed.data.ttl_hours).toBe(24);
    expect(ledger.balance('player-1')).toBe(before - 500);
    expect(market.getSearch('id-1')?.status).toBe('resolved');
  });

  it('only renews the requester\'s own searches', () => {
    const { market, ledger } = makeMarket({ 'player-1': 500000, 'player-2': 500000 });
    const search = market.requestSearch('player-1', EXCAVATOR, 3, 1);
    if (!search.success) throw new Error(search.error.message);
    const result = market.renewSearch(search.data.search_id, 'player-2');
    expect(!result.success && result.error.message).toBe(`Search ${search.data.search_id} not found`);
    expect(ledger.balance('player-2')).toBe(500000);
  });

  it('refuses a renewal the requester cannot pay for', () => {
    const { market, ledger } = makeMarket({ 'player-1': 700 });
    const search = market.requestSearch('player-1', EXCAVATOR, 3, 1);
    if (!search.success) throw new Error(search.error.message);
    const result = market.renewSearch(search.data.search_id, 'player-1');
    expect(!result.success && result.error.code).toBe('FUNDS_ERROR');
    expect(ledger.balance('player-1')).toBe(200);
    expect(market.getActiveSearches('player-1')).toHaveLength(1);
  });
});

describe('submitOffer', () => {
  it('gets a counter on a close offer, then accepts the next one', () => {
    const fixture = makeMarket();
    const { market, ledger } = fixture;
    const listingId = findPoorExcavator(fixture);
    const balanceBefore = ledger.balance('player-1');

    // motivated seller: threshold 0.82; 42600 / 53136 leaves a 1.8% gap
    const first = market.submitOffer(listingId, 'player-1', 42600);
    expect(first.success).toBe(true);
    if (!first.success) return;
    expect(first.data.action).toBe('COUNTER');
    expect(first.data.counter_price).toBe(48500);
    expect(first.data.listing?.status).toBe('negotiating');
    expect(first.data.listing?.ttl_started).toBe(true);
    expect(first.data.listing?.asking_price).toBe(48500);

    const second = market.submitOffer(listingId, 'player-1', 45000);
    expect(second.success && second.data.action).toBe('ACCEPT');
    expect(second.success && second.data.price_paid).toBe(45000);
    expect(ledger.balance('player-1')).toBe(balanceBefore - 45000);
    expect(market.getListing(listingId)).toBeUndefined();
    expect(market.getStatistics('player-1').current.offers_made).toBe(2);
    expect(market.getStatistics('player-1').current.sales_completed).toBe(1);
  });

  it('withdraws the listing for good when the seller walks away', () => {
    const fixture = makeMarket();
    const { market, random } = fixture;
    const listingId = findPoorExcavator(fixture);

    random.push(0.01);
    const result = market.submitOffer(listingId, 'player-1', 5000);
    expect(result.success && result.data.action).toBe('WALK_AWAY');
    expect(result.success && result.data.listing).toBeNull();

    expect(market.getListing(listingId)).toBeUndefined();
    expect(market.getActiveListings('player-1')).toEqual([]);
    expect(market.getActiveSearches('player-1')).toEqual([]);
    const again = market.submitOffer(listingId, 'player-1', 50000);
    expect(!again.success && again.error.code).toBe('VALIDATION_ERROR');
    expect(market.purchaseListing(listingId, 'player-1').success).toBe(false);
    expect(market.getHoursRemaining(listingId, 'player-1').success).toBe(false);
  });

  it('rolls back an accepted offer the buyer cannot pay for', () => {
    const fixture = makeMarket({ 'player-1': 500 });
    const { market } = fixture;
    const listingId = findPoorExcavator(fixture);

    const result = market.submitOffer(listingId, 'player-1', 53136);
    expect(!result.success && result.error.code).toBe('FUNDS_ERROR');
    const view = market.getListing(listingId);
    expect(view?.status).toBe('found');
    expect(view?.negotiation).toBeNull();
    expect(view?.ttl_started).toBe(false);
    expect(market.getStatistics('player-1').current.offers_made).toBe(0);
  });

  it('counts an offer the seller accepts once it is paid for', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    const result = fixture.market.submitOffer(listingId, 'player-1', 53136);
    expect(result.success && result.data.action).toBe('ACCEPT');
    expect(fixture.market.getStatistics('player-1').current.offers_made).toBe(1);
  });

  it('rejects offers from anyone but the owner', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    const result = fixture.market.submitOffer(listingId, 'player-2', 40000);
    expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
    expect(fixture.notifier.last()?.owner_id).toBe('player-2');
  });

  it('rejects offers above 1.5x asking', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    const result = fixture.market.submitOffer(listingId, 'player-1', 80000);
    expect(!result.success && result.error.details).toEqual({ reason: 'OFFER_TOO_HIGH' });
  });
});

describe('purchaseListing', () => {
  it('buys at the current asking price', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    const before = fixture.ledger.balance('player-1');
    const result = fixture.market.purchaseListing(listingId, 'player-1');
    expect(result.success && result.data.price_paid).toBe(53136);
    expect(result.success && result.data.listing.status).toBe('sold');
    expect(fixture.ledger.balance('player-1')).toBe(before - 53136);
    expect(fixture.market.getActiveListings()).toEqual([]);
  });
});
