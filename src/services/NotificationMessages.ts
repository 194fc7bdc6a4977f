/**
 * Webhook message builders for contract notifications.
 */

import type { DiscordMention } from '../config.js';
import type { Embed, WebhookMessage } from '../providers/IWebhookProvider.js';
import type { ContractHandlerRow, ContractRow, EveEntityRow, LocationRow } from '../types/database.js';
import type { ContractStatus } from '../types/models.js';
import { formatMillionIsk, formatThousandM3, solarSystemName } from '../utils/format.js';

export const COLOR_PASSED = 0x008000;
export const COLOR_FAILED = 0xff0000;

const IMAGE_SERVER = 'https://images.evetech.net';

/** A contract with the rows its message refers to. */
export interface ContractDetails {
  contract: ContractRow;
  issuer: EveEntityRow | null;
  acceptor: EveEntityRow | null;
  startLocation: LocationRow | null;
  endLocation: LocationRow | null;
}

export function characterPortraitUrl(characterId: number, size = 128): string {
  return `${IMAGE_SERVER}/characters/${characterId}/portrait?size=${size}`;
}

export function organizationLogoUrl(
  handler: Pick<ContractHandlerRow, 'organization_id' | 'organization_category'>,
  size = 128
): string {
  const kind = handler.organization_category === 'alliance' ? 'alliances' : 'corporations';
  return `${IMAGE_SERVER}/${kind}/${handler.organization_id}/logo?size=${size}`;
}

export function priceCheckText(issues: string[] | null): string {
  if (issues === null) return 'N/A';
  return issues.length === 0 ? 'passed' : 'FAILED';
}

function priceCheckColor(issues: string[] | null): number | undefined {
  if (issues === null) return undefined;
  return issues.length === 0 ? COLOR_PASSED : COLOR_FAILED;
}

function entityName(entity: EveEntityRow | null, fallbackId: number | null): string {
  if (entity) return entity.name;
  return fallbackId === null ? '?' : String(fallbackId);
}

function systemName(location: LocationRow | null, fallbackId: number): string {
  return location ? solarSystemName(location) : String(fallbackId);
}

function formatDate(iso: string): string {
  // 2019-10-08T13:40:33.000Z → 2019-10-08 13:40
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

export function buildContractEmbed(details: ContractDetails, statusText?: string): Embed {
  const { contract } = details;
  const lines = [
    `**From**: ${details.startLocation?.name ?? contract.start_location_id}`,
    `**To**: ${details.endLocation?.name ?? contract.end_location_id}`,
    `**Route**: ${systemName(details.startLocation, contract.start_location_id)} → ${systemName(details.endLocation, contract.end_location_id)}`,
    `**Reward**: ${formatMillionIsk(contract.reward)}`,
    `**Collateral**: ${formatMillionIsk(contract.collateral)}`,
    `**Volume**: ${formatThousandM3(contract.volume)}`,
    `**Price Check**: ${priceCheckText(contract.issues)}`,
  ];
  if (statusText) {
    lines.push(`**Status**: ${statusText}`);
  }
  lines.push(
    `**Expires on**: ${formatDate(contract.date_expired)}`,
    `**Issued by**: ${entityName(details.issuer, contract.issuer_id)}`
  );

  const color = priceCheckColor(contract.issues);
  return {
    title: contract.title ?? `Contract ${contract.contract_id}`,
    description: lines.join('\n'),
    timestamp: contract.date_issued,
    ...(color !== undefined && { color }),
    thumbnail: { url: characterPortraitUrl(contract.issuer_id) },
  };
}

function withMention(mention: DiscordMention | null, text: string): string {
  return mention ? `${mention} ${text}` : text;
}

/** New outstanding contract for pilots. */
export function buildOperatorMessage(
  details: ContractDetails,
  mention: DiscordMention | null
): WebhookMessage {
  const issuer = entityName(details.issuer, details.contract.issuer_id);
  return {
    content: withMention(
      mention,
      `There is a new courier contract from ${issuer} looking to be picked up:`
    ),
    embeds: [buildContractEmbed(details)],
  };
}

const CUSTOMER_STATUS_TEXT: Partial<Record<ContractStatus, string>> = {
  outstanding: 'Waiting to be picked up',
  in_progress: 'In transit',
  finished: 'Delivered',
  failed: 'Failed',
};

function customerContent(details: ContractDetails): string {
  const issuer = entityName(details.issuer, details.contract.issuer_id);
  switch (details.contract.status) {
    case 'outstanding':
      return `${issuer}, we have received your contract and a pilot will pick it up soon.`;
    case 'in_progress':
      return `${issuer}, your contract has been picked up by ${entityName(details.acceptor, details.contract.acceptor_id)} and is on its way.`;
    case 'finished':
      return `${issuer}, your contract has been delivered. Thank you for using our freight service.`;
    case 'failed':
      return `${issuer}, your contract could not be delivered. Please contact us for details.`;
    default:
      return `${issuer}, your contract is now ${details.contract.status}.`;
  }
}

/** Status update for the customer who issued the contract. */
export function buildCustomerMessage(details: ContractDetails): WebhookMessage {
  return {
    content: customerContent(details),
    embeds: [
      buildContractEmbed(
        details,
        CUSTOMER_STATUS_TEXT[details.contract.status] ?? details.contract.status
      ),
    ],
  };
}
