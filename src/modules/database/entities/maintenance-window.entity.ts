export interface MaintenanceWindow {
    id: number;
    car_id: number;
    type: string;
    cost_cents: number;
    start_date: string;
    end_date: string | null; // last day in the shop; null while open
    notes: string | null;
    created_at: string;
}

export interface CreateMaintenanceWindowData {
    car_id: number;
    type: string;
    cost_cents?: number;
    start_date: string;
    end_date?: string | null;
    notes?: string | null;
}

export type MaintenanceState = 'open' | 'closed' | 'all';

export interface MaintenanceFilters {
    car_id?: number;
    state?: MaintenanceState;
    sort?: 'start_asc' | 'start_desc';
}
