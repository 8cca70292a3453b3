import Matter from 'matter-js';

export const { Bodies, Body, Composite, Engine, Events } = Matter;

export type {
    Body as MatterBody,
    Engine as MatterEngine,
    IEventCollision,
} from 'matter-js';
