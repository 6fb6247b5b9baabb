/**
 * Dealer Franchise Report Extractor
 *
 * Output rows map onto the report as:
 * entityId = dealer number, entityName = dealership name without its legal
 * suffix, entityContact = phone, period = year, countA/B/C = new/used/total.
 */

import { compileProfile } from '../profile';
import { ReportExtractor } from '../report-extractor';
import { DEALER_FRANCHISE_PROFILE } from './patterns';

export const dealerFranchiseExtractor = new ReportExtractor(compileProfile(DEALER_FRANCHISE_PROFILE));

export * from './patterns';
