import { normalizeAgentTier, normalizeQualityTier, validateHiddenQuality } from '@usedmarket/engine-core';
import { createApiError, createApiResponse, type ApiResponse, type FlatRecord } from '@usedmarket/shared';
import { z } from 'zod';
import type { SearchRequest } from '../acquisition/types.js';
import type { OfferHistoryEntry, PendingOffer, SaleItem, SaleRequest } from '../disposition/types.js';
import { HIDDEN_FIELDS, type ListingRecord } from '../listing/types.js';
import type { NegotiationRecord } from '../negotiation/types.js';

// ─── Field schemas ───────────────────────────────────────────
// Saved values may come back as strings; everything numeric or boolean is coerced.

const id = z.string().min(1);
const num = z.coerce.number().finite();
const int = z.coerce.number().int();
const unit = num.min(0).max(1);
const bool = z.union([z.boolean(), z.enum(['true', 'false'])]).transform((v) => v === true || v === 'true');
const agentTier = z.coerce.number().pipe(z.union([z.literal(1), z.literal(2), z.literal(3)]));
const inspectionTier = agentTier;
const idList = z
  .string()
  .default('')
  .transform((v) => v.split(',').filter((part) => part.length > 0));

const listingSchema = z.object({
  listing_id: id,
  category_id: id,
  item_name: id,
  owner_id: id,
  source: z.enum(['acquisition', 'disposition']),
  search_id: id.optional(),
  sale_id: id.optional(),
  status: z.enum(['searching', 'found', 'negotiating']),
  created_at_hour: int.default(0),
  ttl_hours: int.min(0),
  ttl_started: bool.default(false),
  hidden_quality: num.refine((q) => validateHiddenQuality(q) === null, 'hidden quality must be within 0..1'),
  age_years: num.min(0).default(0),
  damage: unit.default(0),
  wear: unit.default(0),
  operating_hours: num.min(0).default(0),
  generation: z.enum(['RECENT', 'MID_AGE', 'OLD']).default('MID_AGE'),
  engine_reliability: unit.optional(),
  hydraulic_reliability: unit.optional(),
  electrical_reliability: unit.optional(),
  base_price: num.positive(),
  asking_price: num.positive(),
  commission: num.min(0).default(0),
  on_hold: bool.default(false),
  inspection_state: z.enum(['none', 'pending', 'complete']).default('none'),
  inspection_tier: inspectionTier.optional(),
  inspection_requested_at_hour: int.optional(),
  inspection_completes_at_hour: int.optional(),
  inspection_fee_paid: num.min(0).default(0),
  revealed: z
    .string()
    .default('')
    .transform((v) => v.split(',').filter((part) => part.length > 0))
    .pipe(z.array(z.enum(HIDDEN_FIELDS))),
  periods_listed: int.min(0).default(0),
});

const negotiationSchema = z.object({
  negotiation_personality: z.enum(['desperate', 'motivated', 'reasonable', 'firm', 'immovable']),
  negotiation_acceptance_threshold: num,
  negotiation_tolerance: num,
  negotiation_state: z.enum(['AWAITING_OFFER', 'COUNTERED', 'ACCEPTED', 'REJECTED', 'WALKED_AWAY']),
  negotiation_list_price: num.positive(),
  negotiation_current_asking: num.positive(),
  negotiation_last_offer: num.optional(),
  negotiation_round: int.min(0).default(0),
  negotiation_weather_modifier: num.default(0),
});

const searchSchema = z.object({
  search_id: id,
  requester_id: id,
  category_id: id,
  item_name: id,
  base_price: num.positive(),
  quality_tier: num.transform(normalizeQualityTier),
  agent_tier: num.transform(normalizeAgentTier),
  fee_paid: num.min(0).default(0),
  created_at_hour: int.default(0),
  ttl_hours: int.min(0),
  status: z.enum(['active', 'resolved']),
  success: bool.optional(),
  result_ids: idList,
});

const saleSchema = z.object({
  sale_id: id,
  owner_id: id,
  item_id: id,
  item_name: id,
  item_category_id: id,
  item_vanilla_value: num.positive(),
  item_age_years: num.min(0).optional(),
  item_damage: unit.optional(),
  item_wear: unit.optional(),
  item_operating_hours: num.min(0).optional(),
  listing_id: id,
  agent_tier: agentTier,
  fee_paid: num.min(0).default(0),
  created_at_hour: int.default(0),
  next_offer_in_hours: int,
  status: z.enum(['active', 'sold', 'cancelled', 'expired']).default('active'),
  offer_count: int.min(0).default(0),
  pending_offer_amount: num.positive().optional(),
  pending_offer_made_at_hour: int.optional(),
  pending_offer_expires_in_hours: int.optional(),
});

const offerEntrySchema = z.object({
  amount: num.positive(),
  hour: int,
  accepted: z
    .union([z.boolean(), z.enum(['true', 'false', 'pending'])])
    .default('pending')
    .transform((v) => (v === 'pending' ? null : v === true || v === 'true')),
});

// ─── Helpers ─────────────────────────────────────────────────

function corrupt(kind: string, flat: FlatRecord, error: z.ZodError): ApiResponse<never> {
  const recordId = flat[`${kind}_id`];
  return createApiError('CORRUPT_RECORD', `Corrupt ${kind} record ${String(recordId ?? '(no id)')}`, {
    issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

/** Copy entries whose value is set; nulls and undefined are left out of the flat form. */
function assign(target: FlatRecord, values: Record<string, string | number | boolean | null | undefined>): void {
  for (const [key, value] of Object.entries(values)) {
    if (value !== null && value !== undefined) {
      target[key] = value;
    }
  }
}

// ─── Listings ────────────────────────────────────────────────

export function serializeListing(record: ListingRecord): FlatRecord {
  const flat: FlatRecord = {};
  assign(flat, {
    listing_id: record.listing_id,
    category_id: record.category_id,
    item_name: record.item_name,
    owner_id: record.owner_id,
    source: record.source,
    search_id: record.search_id,
    sale_id: record.sale_id,
    status: record.status,
    created_at_hour: record.created_at_hour,
    ttl_hours: record.ttl_hours,
    ttl_started: record.ttl_started,
    hidden_quality: record.hidden_quality,
    age_years: record.age_years,
    damage: record.damage,
    wear: record.wear,
    operating_hours: record.operating_hours,
    generation: record.generation,
    engine_reliability: record.engine_reliability,
    hydraulic_reliability: record.hydraulic_reliability,
    electrical_reliability: record.electrical_reliability,
    base_price: record.base_price,
    asking_price: record.asking_price,
    commission: record.commission,
    on_hold: record.on_hold,
    inspection_state: record.inspection_state,
    inspection_tier: record.inspection_tier,
    inspection_requested_at_hour: record.inspection_requested_at_hour,
    inspection_completes_at_hour: record.inspection_completes_at_hour,
    inspection_fee_paid: record.inspection_fee_paid,
    revealed: [...record.revealed].join(','),
    periods_listed: record.periods_listed,
  });
  const { negotiation } = record;
  if (negotiation) {
    assign(flat, {
      negotiation_personality: negotiation.personality,
      negotiation_acceptance_threshold: negotiation.acceptance_threshold,
      negotiation_tolerance: negotiation.tolerance,
      negotiation_state: negotiation.state,
      negotiation_list_price: negotiation.list_price,
      negotiation_current_asking: negotiation.current_asking,
      negotiation_last_offer: negotiation.last_offer,
      negotiation_round: negotiation.round,
      negotiation_weather_modifier: negotiation.weather_modifier,
    });
  }
  return flat;
}

function readNegotiation(flat: FlatRecord): ApiResponse<NegotiationRecord | null> {
  if (!('negotiation_state' in flat)) {
    return createApiResponse(null);
  }
  const parsed = negotiationSchema.safeParse(flat);
  if (!parsed.success) {
    return corrupt('listing', flat, parsed.error);
  }
  const n = parsed.data;
  return createApiResponse({
    personality: n.negotiation_personality,
    acceptance_threshold: n.negotiation_acceptance_threshold,
    tolerance: n.negotiation_tolerance,
    state: n.negotiation_state,
    list_price: n.negotiation_list_price,
    current_asking: n.negotiation_current_asking,
    last_offer: n.negotiation_last_offer ?? null,
    round: n.negotiation_round,
    weather_modifier: n.negotiation_weather_modifier,
  });
}

export function deserializeListing(flat: FlatRecord): ApiResponse<ListingRecord> {
  const parsed = listingSchema.safeParse(flat);
  if (!parsed.success) {
    return corrupt('listing', flat, parsed.error);
  }
  const negotiation = readNegotiation(flat);
  if (!negotiation.success) return negotiation;

  const l = parsed.data;
  const soundness = 1 - l.damage;
  return createApiResponse({
    listing_id: l.listing_id,
    category_id: l.category_id,
    item_name: l.item_name,
    owner_id: l.owner_id,
    source: l.source,
    search_id: l.search_id ?? null,
    sale_id: l.sale_id ?? null,
    status: l.status,
    created_at_hour: l.created_at_hour,
    ttl_hours: l.ttl_hours,
    ttl_started: l.ttl_started,
    hidden_quality: l.hidden_quality,
    age_years: l.age_years,
    damage: l.damage,
    wear: l.wear,
    operating_hours: l.operating_hours,
    generation: l.generation,
    engine_reliability: l.engine_reliability ?? soundness,
    hydraulic_reliability: l.hydraulic_reliability ?? soundness,
    electrical_reliability: l.electrical_reliability ?? soundness,
    base_price: l.base_price,
    asking_price: l.asking_price,
    commission: l.commission,
    on_hold: l.on_hold,
    inspection_state: l.inspection_state,
    inspection_tier: l.inspection_tier ?? null,
    inspection_requested_at_hour: l.inspection_requested_at_hour ?? null,
    inspection_completes_at_hour: l.inspection_completes_at_hour ?? null,
    inspection_fee_paid: l.inspection_fee_paid,
    revealed: new Set(l.revealed),
    periods_listed: l.periods_listed,
    negotiation: negotiation.data,
  });
}

// ─── Searches ────────────────────────────────────────────────

export function serializeSearch(search: SearchRequest): FlatRecord {
  const flat: FlatRecord = {};
  assign(flat, {
    search_id: search.search_id,
    requester_id: search.requester_id,
    category_id: search.category_id,
    item_name: search.item_name,
    base_price: search.base_price,
    quality_tier: search.quality_tier,
    agent_tier: search.agent_tier,
    fee_paid: search.fee_paid,
    created_at_hour: search.created_at_hour,
    ttl_hours: search.ttl_hours,
    status: search.status,
    success: search.success,
    result_ids: search.result_ids.join(','),
  });
  return flat;
}

export function deserializeSearch(flat: FlatRecord): ApiResponse<SearchRequest> {
  const parsed = searchSchema.safeParse(flat);
  if (!parsed.success) {
    return corrupt('search', flat, parsed.error);
  }
  const s = parsed.data;
  return createApiResponse({
    search_id: s.search_id,
    requester_id: s.requester_id,
    category_id: s.category_id,
    item_name: s.item_name,
    base_price: s.base_price,
    quality_tier: s.quality_tier,
    agent_tier: s.agent_tier,
    fee_paid: s.fee_paid,
    created_at_hour: s.created_at_hour,
    ttl_hours: s.ttl_hours,
    status: s.status,
    success: s.success ?? null,
    result_ids: s.result_ids,
  });
}

// ─── Sales ───────────────────────────────────────────────────

function serializeAccepted(accepted: boolean | null): string {
  if (accepted === null) return 'pending';
  return accepted ? 'true' : 'false';
}

/** Offer history is flattened as offer_count plus offer_<i>_amount / _hour / _accepted. */
export function serializeSale(sale: SaleRequest): FlatRecord {
  const flat: FlatRecord = {};
  assign(flat, {
    sale_id: sale.sale_id,
    owner_id: sale.owner_id,
    item_id: sale.item.item_id,
    item_name: sale.item.item_name,
    item_category_id: sale.item.category_id,
    item_vanilla_value: sale.item.vanilla_value,
    item_age_years: sale.item.age_years,
    item_damage: sale.item.damage,
    item_wear: sale.item.wear,
    item_operating_hours: sale.item.operating_hours,
    listing_id: sale.listing_id,
    agent_tier: sale.agent_tier,
    fee_paid: sale.fee_paid,
    created_at_hour: sale.created_at_hour,
    next_offer_in_hours: sale.next_offer_in_hours,
    status: sale.status,
    offer_count: sale.offer_history.length,
    pending_offer_amount: sale.pending_offer?.amount,
    pending_offer_made_at_hour: sale.pending_offer?.made_at_hour,
    pending_offer_expires_in_hours: sale.pending_offer?.expires_in_hours,
  });
  sale.offer_history.forEach((entry, i) => {
    flat[`offer_${i}_amount`] = entry.amount;
    flat[`offer_${i}_hour`] = entry.hour;
    flat[`offer_${i}_accepted`] = serializeAccepted(entry.accepted);
  });
  return flat;
}

export function deserializeSale(flat: FlatRecord): ApiResponse<SaleRequest> {
  const parsed = saleSchema.safeParse(flat);
  if (!parsed.success) {
    return corrupt('sale', flat, parsed.error);
  }
  const s = parsed.data;

  const history: OfferHistoryEntry[] = [];
  for (let i = 0; i < s.offer_count; i++) {
    const entry = offerEntrySchema.safeParse({
      amount: flat[`offer_${i}_amount`],
      hour: flat[`offer_${i}_hour`],
      accepted: flat[`offer_${i}_accepted`],
    });
    if (!entry.success) {
      return corrupt('sale', flat, entry.error);
    }
    history.push(entry.data);
  }

  const item: SaleItem = {
    item_id: s.item_id,
    item_name: s.item_name,
    category_id: s.item_category_id,
    vanilla_value: s.item_vanilla_value,
  };
  if (s.item_age_years !== undefined) item.age_years = s.item_age_years;
  if (s.item_damage !== undefined) item.damage = s.item_damage;
  if (s.item_wear !== undefined) item.wear = s.item_wear;
  if (s.item_operating_hours !== undefined) item.operating_hours = s.item_operating_hours;

  const amount = s.pending_offer_amount;
  const madeAt = s.pending_offer_made_at_hour;
  const expiresIn = s.pending_offer_expires_in_hours;
  const pending: PendingOffer | null =
    amount !== undefined && madeAt !== undefined && expiresIn !== undefined
      ? { amount, made_at_hour: madeAt, expires_in_hours: expiresIn }
      : null;

  return createApiResponse({
    sale_id: s.sale_id,
    owner_id: s.owner_id,
    item,
    listing_id: s.listing_id,
    agent_tier: s.agent_tier,
    fee_paid: s.fee_paid,
    created_at_hour: s.created_at_hour,
    next_offer_in_hours: s.next_offer_in_hours,
    offer_history: history,
    pending_offer: pending,
    status: s.status,
  });
}
