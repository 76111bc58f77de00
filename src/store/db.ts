import type { Guest, ItemCategory, MenuItem } from '../domain/types.js';

function key(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * In-memory guest list and catalog. Names are unique case-insensitively;
 * listing keeps insertion order, which is the order the optimizer enumerates.
 */
class InMemoryDB {
  private guests: Map<string, Guest> = new Map();
  private menuItems: Map<string, MenuItem> = new Map();

  // Guests
  createGuest(guest: Guest): void {
    this.guests.set(key(guest.name), guest);
  }

  getGuest(name: string): Guest | undefined {
    return this.guests.get(key(name));
  }

  listGuests(): Guest[] {
    return Array.from(this.guests.values());
  }

  updateGuest(name: string, guest: Guest): void {
    // Map.set on an existing key keeps its position
    if (this.guests.has(key(name))) {
      this.guests.set(key(name), guest);
    }
  }

  deleteGuest(name: string): boolean {
    return this.guests.delete(key(name));
  }

  countGuests(): number {
    return this.guests.size;
  }

  // Menu items
  createMenuItem(item: MenuItem): void {
    this.menuItems.set(key(item.name), item);
  }

  getMenuItem(name: string): MenuItem | undefined {
    return this.menuItems.get(key(name));
  }

  listMenuItems(): MenuItem[] {
    return Array.from(this.menuItems.values());
  }

  listMenuItemsByCategory(category: ItemCategory): MenuItem[] {
    return this.listMenuItems().filter((item) => item.category === category);
  }

  deleteMenuItem(name: string): boolean {
    return this.menuItems.delete(key(name));
  }

  countMenuItems(): number {
    return this.menuItems.size;
  }

  // Seed data helper
  seed(data: { guests?: Guest[]; menuItems?: MenuItem[] }): void {
    data.menuItems?.forEach((item) => this.createMenuItem(item));
    data.guests?.forEach((guest) => this.createGuest(guest));
  }

  clearGuests(): number {
    const count = this.guests.size;
    this.guests.clear();
    return count;
  }

  // Clear all (for testing)
  clear(): void {
    this.guests.clear();
    this.menuItems.clear();
  }
}

export const db = new InMemoryDB();
