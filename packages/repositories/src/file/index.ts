/**
 * File-backed Sources
 */

export {
  createFileMarketIntelligenceSource,
  BidderProfileRowSchema,
  DomainStatRowSchema,
  AuctionArchetypeRowSchema,
  MARKET_INTELLIGENCE_FILES,
} from "./market-intelligence-source";
