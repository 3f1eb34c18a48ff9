export interface Facility {
    id: string;
    name: string;
    district: string;
    address: string;
    sports: string[];
    isActive: boolean;
}
