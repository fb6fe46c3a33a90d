import { describe, it, expect } from 'vitest';
import { findPoorExcavator, makeMarket, tickThrough } from './fixtures.js';

describe('requestInspection', () => {
  it('Quick inspection at hour 1000 completes at 1002', () => {
    const fixture = makeMarket();
    const { market, ledger } = fixture;
    const listingId = findPoorExcavator(fixture);
    market.onHourTick(1000);
    const before = ledger.balance('player-1');

    const booked = market.requestInspection(listingId, 'player-1', 1);
    expect(booked.success).toBe(true);
    if (!booked.success) return;
    // 1000 + 2% of 53136, under the 2500 cap
    expect(ledger.balance('player-1')).toBe(before - 2063);
    expect(booked.data.on_hold).toBe(true);
    expect(booked.data.inspection_completes_at_hour).toBe(1002);
    expect(market.getInspectionHoursRemaining(listingId, 'player-1')).toEqual({ success: true, data: 2 });

    market.onHourTick(1001);
    expect(market.getListing(listingId)?.on_hold).toBe(true);
    expect(market.getListing(listingId)?.hidden).toEqual({});
    expect(market.getInspectionHoursRemaining(listingId, 'player-1')).toEqual({ success: true, data: 1 });

    market.onHourTick(1002);
    const done = market.getListing(listingId);
    expect(done?.on_hold).toBe(false);
    expect(done?.inspection_state).toBe('complete');
    expect(done?.hidden).toEqual({ overall_rating: 'poor' });
  });

  it('does not tick the offer window while on hold', () => {
    const fixture = makeMarket();
    const { market } = fixture;
    const listingId = findPoorExcavator(fixture);
    market.viewListing(listingId, 'player-1');
    market.onHourTick(25);
    expect(market.getListing(listingId)?.ttl_hours).toBe(71);

    market.requestInspection(listingId, 'player-1', 1);
    tickThrough(market, 26, 27);
    expect(market.getListing(listingId)?.ttl_hours).toBe(71);
    expect(market.getListing(listingId)?.on_hold).toBe(false);

    market.onHourTick(28);
    expect(market.getListing(listingId)?.ttl_hours).toBe(70);
  });

  it('reveals reliability at Standard depth', () => {
    const fixture = makeMarket();
    const { market } = fixture;
    const listingId = findPoorExcavator(fixture);
    market.requestInspection(listingId, 'player-1', 2);
    tickThrough(market, 25, 30);
    const hidden = market.getListing(listingId)?.hidden;
    expect(hidden?.overall_rating).toBe('poor');
    // 1 - damage, no variance at the 0.5 draw
    expect(hidden?.engine_reliability).toBeCloseTo(0.1225, 10);
    expect(hidden?.quality_hint).toBeUndefined();
  });

  it('reveals everything at Comprehensive depth', () => {
    const fixture = makeMarket();
    const { market } = fixture;
    const listingId = findPoorExcavator(fixture);
    market.requestInspection(listingId, 'player-1', 3);
    tickThrough(market, 25, 36);
    const hidden = market.getListing(listingId)?.hidden;
    expect(hidden?.quality_hint).toBe('lemon');
    // 200000 * 0.8775 * 0.25 + 200000 * 0.9425 * 0.10
    expect(hidden?.repair_estimate).toBe(62725);
  });

  it('rejects a second inspection', () => {
    const fixture = makeMarket();
    const { market } = fixture;
    const listingId = findPoorExcavator(fixture);
    expect(market.requestInspection(listingId, 'player-1', 1).success).toBe(true);
    const pending = market.requestInspection(listingId, 'player-1', 1);
    expect(!pending.success && pending.error.message).toBe('Excavator is already being inspected');

    tickThrough(market, 25, 26);
    const done = market.requestInspection(listingId, 'player-1', 2);
    expect(!done.success && done.error.message).toBe('Excavator has already been inspected');
  });

  it('does not inspect the owner\'s own sale listing', () => {
    const { market, ledger } = makeMarket();
    const sale = market.listForSale(
      'player-1',
      { item_id: 'item-1', item_name: 'Tractor', category_id: 'tractors', vanilla_value: 80000 },
      1,
    );
    if (!sale.success) throw new Error(sale.error.message);
    const before = ledger.balance('player-1');

    const result = market.requestInspection(sale.data.listing_id, 'player-1', 1);
    expect(!result.success && result.error.message).toBe(`Listing ${sale.data.listing_id} is not open to inspection`);
    expect(ledger.balance('player-1')).toBe(before);
    expect(market.getListing(sale.data.listing_id)?.on_hold).toBe(false);
  });

  it('rejects an unknown tier without charging', () => {
    const fixture = makeMarket();
    const listingId = findPoorExcavator(fixture);
    const before = fixture.ledger.balance('player-1');
    const result = fixture.market.requestInspection(listingId, 'player-1', 5);
    expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
    expect(!result.success && result.error.details).toEqual({ reason: 'INVALID_TIER' });
    expect(fixture.ledger.balance('player-1')).toBe(before);
  });

  it('cancels without a refund and clears the hold', () => {
    const fixture = makeMarket();
    const { market, ledger } = fixture;
    const listingId = findPoorExcavator(fixture);
    market.requestInspection(listingId, 'player-1', 1);
    const afterFee = ledger.balance('player-1');
    const result = market.cancelInspection(listingId, 'player-1');
    expect(result.success && result.data.on_hold).toBe(false);
    expect(result.success && result.data.inspection_state).toBe('none');
    expect(ledger.balance('player-1')).toBe(afterFee);
    expect(market.getInspectionHoursRemaining(listingId, 'player-1').success).toBe(false);
  });
});
