export interface PaginationParams {
    skip?: number;
    take?: number;
}

export interface IBaseRepository<T, TCreate, TUpdate> {
    findById(id: string): Promise<T | null>;
    findMany(params: PaginationParams): Promise<T[]>;
    count(): Promise<number>;
    create(data: TCreate): Promise<T>;
    update(id: string, data: TUpdate): Promise<T | null>;
    delete(id: string): Promise<boolean>;
}
