import { describe, it, expect, beforeEach } from 'vitest';

import { InMemoryProductService } from '../memory-products.service';
import type { ProductInput } from '@/types/products.types';

const seed: ProductInput[] = [
    { name: 'Desk Lamp', description: 'LED lamp', price: 24.5, category: 'Lighting' },
    { name: 'Office Chair', description: 'Mesh back', price: 149, category: 'Furniture' },
    { name: 'Floor Lamp', description: 'Arc lamp', price: 89.99, category: 'lighting' },
    { name: 'Bookshelf', description: 'Oak', price: 149, category: 'Furniture' },
];

const ids = (products: { id: number }[]) => products.map((product) => product.id);

describe('InMemoryProductService', () => {
    let service: InMemoryProductService;

    beforeEach(() => {
        service = new InMemoryProductService(seed);
    });

    it('assigns increasing ids on insert', async () => {
        const created = await service.addProduct({
            name: 'Standing Desk',
            description: 'Electric',
            price: 499,
            category: 'Furniture',
        });

        expect(created.id).toBe(5);
        expect(await service.getTotalProductCount()).toBe(5);
    });

    it('lists products in id order', async () => {
        expect(ids(await service.getAllProducts())).toEqual([1, 2, 3, 4]);
    });

    it('finds a product by id and returns null for a missing one', async () => {
        expect(await service.getProductById(2)).toEqual({
            id: 2,
            name: 'Office Chair',
            description: 'Mesh back',
            price: 149,
            category: 'Furniture',
        });
        expect(await service.getProductById(42)).toBeNull();
    });

    it('returns copies that do not alias the store', async () => {
        const product = await service.getProductById(1);
        if (!product) throw new Error('seed product missing');
        product.name = 'Changed';

        expect((await service.getProductById(1))?.name).toBe('Desk Lamp');
    });

    it('searches names case-insensitively by substring', async () => {
        expect(ids(await service.getProductsByName('LAMP'))).toEqual([1, 3]);
        expect(await service.getProductsByName('sofa')).toEqual([]);
    });

    it('matches categories case-insensitively', async () => {
        expect(ids(await service.getProductsByCategory('LIGHTING'))).toEqual([1, 3]);
        expect(await service.getProductsByCategory('Light')).toEqual([]);
    });

    it('sorts by price with ties kept in id order', async () => {
        expect(ids(await service.sortProductsByPrice('asc'))).toEqual([1, 3, 2, 4]);
        expect(ids(await service.sortProductsByPrice('desc'))).toEqual([2, 4, 3, 1]);
    });

    it('sorts by name', async () => {
        expect(ids(await service.sortProductsByName('asc'))).toEqual([4, 1, 3, 2]);
        expect(ids(await service.sortProductsByName('desc'))).toEqual([2, 3, 1, 4]);
    });

    it('sorts by category', async () => {
        const sorted = await service.sortProductsByCategory('asc');

        expect(ids(sorted.slice(0, 2))).toEqual([2, 4]);
        expect(sorted.map((product) => product.category.toLowerCase())).toEqual([
            'furniture',
            'furniture',
            'lighting',
            'lighting',
        ]);
    });

    it('overwrites an existing product on update', async () => {
        const updated = await service.updateProduct({
            id: 1,
            name: 'Reading Lamp',
            description: 'Warm LED',
            price: 29.99,
            category: 'Lighting',
        });

        expect(updated?.name).toBe('Reading Lamp');
        expect(await service.getProductById(1)).toEqual({
            id: 1,
            name: 'Reading Lamp',
            description: 'Warm LED',
            price: 29.99,
            category: 'Lighting',
        });
    });

    it('returns null when updating a missing product', async () => {
        const updated = await service.updateProduct({
            id: 42,
            name: 'Ghost',
            description: '',
            price: 0,
            category: 'None',
        });

        expect(updated).toBeNull();
        expect(await service.getTotalProductCount()).toBe(4);
    });

    it('deletes a single product', async () => {
        expect(await service.deleteProduct(3)).toBe(true);
        expect(await service.deleteProduct(3)).toBe(false);
        expect(ids(await service.getAllProducts())).toEqual([1, 2, 4]);
    });

    it('deletes everything and reports how many were removed', async () => {
        expect(await service.deleteAllProducts()).toBe(4);
        expect(await service.getTotalProductCount()).toBe(0);
    });
});
