// ============================================
// IngredientBinBehavior Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { GAME_CONFIG, INGREDIENT_COLOR_VALUES, Palette } from '#shared';
import { IngredientBinBehavior } from '../IngredientBinBehavior';
import { createIngredientBin } from '../../factories';
import { createBareTestGame } from '../../../__tests__/testUtils';

describe('IngredientBinBehavior', () => {
  it('draws its color with a dark rim', () => {
    const game = createBareTestGame();
    const id = createIngredientBin(game.state, 'purple', { x: 40, y: 480 });
    if (id === null) throw new Error('no bin');
    new IngredientBinBehavior().update(game.state, game.state.registry.get(id));

    const commands = [...game.state.queue.drain()];
    expect(commands.map((c) => c.type)).toEqual(['rect', 'borderRect']);
    expect(commands[0]).toMatchObject({ color: INGREDIENT_COLOR_VALUES.purple });
    expect(commands[1]).toMatchObject({ color: Palette.darkGrey, border: GAME_CONFIG.STOVE_BORDER });
  });

  it('draws the same while paused', () => {
    const game = createBareTestGame();
    const id = createIngredientBin(game.state, 'green', { x: 40, y: 320 });
    if (id === null) throw new Error('no bin');
    new IngredientBinBehavior().draw(game.state, game.state.registry.get(id));

    const commands = [...game.state.queue.drain()];
    expect(commands.map((c) => c.type)).toEqual(['rect', 'borderRect']);
    expect(commands[0].pos).toEqual({ x: 40, y: 320 });
  });
});
