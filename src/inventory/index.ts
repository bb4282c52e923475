export {
  JsonFilePantryStore,
  InMemoryPantryStore,
  PantryFileSchema,
  type PantryStore,
} from './pantry-store.js';
export {
  normalizeIngredientName,
  findMissing,
  mergeIngredients,
  parseIngredientList,
} from './ingredients.js';
