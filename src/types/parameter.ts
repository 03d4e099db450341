/**
 * A measured quantity (e.g., δ18O, loss on ignition).
 */
export interface Parameter {
    parameter_id: number;
    name: string;
    /** Unique, matches [A-Za-z0-9_.-]+ */
    slug: string;
    description: string;
    preparation: string;
    instrumentation: string;
    created_at?: string;
}

export type ParameterInput = Pick<Parameter, 'name' | 'slug'> &
    Partial<Pick<Parameter, 'description' | 'preparation' | 'instrumentation'>>;
