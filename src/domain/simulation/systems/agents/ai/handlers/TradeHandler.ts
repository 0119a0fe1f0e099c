/**
 * @fileoverview Handler de Comercio
 *
 * Compras y ventas con un vendedor. Transaccional: o se mueve todo
 * (dinero e inventario de ambas partes) o no se mueve nada.
 *
 * @module domain/simulation/systems/agents/ai/handlers/TradeHandler
 */

import { ActionType } from "@/shared/constants/AIEnums";
import { ItemCatalog } from "@/domain/data/ItemCatalog";
import { roundMoney } from "@/shared/utils/mathUtils";
import type { HandlerContext, HandlerExecutionResult } from "../types";
import { errorResult, successResult } from "../types";

function handleBuy(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  const item = plan.targetItem;
  const vendor = sites.getVendor(plan.targetEntity);
  if (!item) return errorResult("No item to buy");
  if (!vendor) return errorResult(`Unknown vendor: ${plan.targetEntity}`);

  const price = vendor.getSellPrice(item);
  const total = roundMoney(price * plan.quantity);
  if (villager.money < total) {
    return errorResult(`Cannot afford ${total}`);
  }

  const sale = vendor.sellItemToCustomer(item, plan.quantity, price);
  if (!sale.success) return errorResult(sale.message);

  villager.spend(sale.total);
  villager.addItem(item, plan.quantity);
  return successResult(
    `Bought ${plan.quantity} ${ItemCatalog.getDisplayName(item)} for ${sale.total}`,
    vendor.id,
    { item, quantity: plan.quantity, total: sale.total },
  );
}

function handleSell(ctx: HandlerContext): HandlerExecutionResult {
  const { villager, plan, sites } = ctx;
  const item = plan.targetItem;
  const vendor = sites.getVendor(plan.targetEntity);
  if (!item) return errorResult("No item to sell");
  if (!vendor) return errorResult(`Unknown vendor: ${plan.targetEntity}`);
  if (!vendor.trades(item)) {
    return errorResult(`${vendor.shopName} does not trade ${item}`);
  }
  if (villager.getItemCount(item) < plan.quantity) {
    return errorResult("Not enough goods to sell");
  }

  const purchase = vendor.buyItemFromProducer(item, plan.quantity);
  if (!purchase.success) return errorResult(purchase.message);

  villager.removeItem(item, plan.quantity);
  villager.earn(purchase.total);
  return successResult(
    `Sold ${plan.quantity} ${ItemCatalog.getDisplayName(item)} for ${purchase.total}`,
    vendor.id,
    { item, quantity: plan.quantity, total: purchase.total },
  );
}

export function handleTrade(ctx: HandlerContext): HandlerExecutionResult {
  switch (ctx.plan.type) {
    case ActionType.BUY:
      return handleBuy(ctx);
    case ActionType.SELL_GOODS:
      return handleSell(ctx);
    default:
      return errorResult("Wrong action type");
  }
}
