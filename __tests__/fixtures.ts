import { SpecialtyConfig } from '../src/models/SpecialtyConfig';

// Growing backlog: capacity 132, arrivals 142
export const dermatology: SpecialtyConfig = {
    name: 'Dermatology',
    doctors: 6,
    nonDoctors: 2,
    doctorRate: 18,
    nonDoctorRate: 12,
    initialBacklog: 1100,
    initialWait: 65,
    dailyArrivals: 142
};

// Shrinking backlog: capacity 160, arrivals 155
export const icu: SpecialtyConfig = {
    name: 'ICU',
    doctors: 10,
    nonDoctors: 20,
    doctorRate: 8,
    nonDoctorRate: 4,
    initialBacklog: 870,
    initialWait: 2,
    dailyArrivals: 155
};

// Balanced flow: capacity 25, arrivals 25
export const balanced: SpecialtyConfig = {
    name: 'Balanced Clinic',
    doctors: 2,
    nonDoctors: 1,
    doctorRate: 10,
    nonDoctorRate: 5,
    initialBacklog: 400,
    initialWait: 20,
    dailyArrivals: 25
};

// No treatment capacity at all
export const unstaffedRates: SpecialtyConfig = {
    name: 'Unstaffed',
    doctors: 1,
    nonDoctors: 1,
    doctorRate: 0,
    nonDoctorRate: 0,
    initialBacklog: 200,
    initialWait: 10,
    dailyArrivals: 5
};
