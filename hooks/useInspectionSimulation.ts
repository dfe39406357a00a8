/**
 * RESPONSIBILITY: Playback of a simulated inspection along a planned path.
 * MUST CONTAIN: currentStep, isSimulating, the simulation timer.
 * MUST NOT CONTAIN: JSX or path planning.
 */
import { useState, useEffect, useRef } from 'react';
import { PathStep, SimulationSettings } from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../data/defaults';
import { InspectionSession } from '../services/inspection/inspectionSession';
import { InspectionSimulation } from '../services/inspection/simulationDriver';

export const useInspectionSimulation = (
    session: InspectionSession | null,
    steps: PathStep[],
    settings: SimulationSettings = DEFAULT_ENGINE_CONFIG.simulation,
    random: () => number = Math.random
) => {
    const [currentStep, setCurrentStep] = useState<number>(-1);
    const [isSimulating, setIsSimulating] = useState<boolean>(false);
    const [isComplete, setIsComplete] = useState<boolean>(false);
    const simulation = useRef<InspectionSimulation | null>(null);
    const simulationInterval = useRef<number | null>(null);

    useEffect(() => {
        simulation.current = session
            ? new InspectionSimulation(session, steps, { successRate: settings.successRate, random })
            : null;
        setCurrentStep(-1);
        setIsComplete(false);
        setIsSimulating(false);
    }, [session, steps, settings.successRate, random]);

    const advanceOnce = (): boolean => {
        const sim = simulation.current;
        if (!sim || !sim.advance()) return false;
        setCurrentStep(sim.currentIndex);
        setIsComplete(sim.isComplete);
        return !sim.isComplete;
    };

    useEffect(() => {
        if (isSimulating) {
            simulationInterval.current = window.setInterval(() => {
                if (!advanceOnce()) setIsSimulating(false);
            }, settings.stepIntervalMs);
        } else if (simulationInterval.current) {
            clearInterval(simulationInterval.current);
            simulationInterval.current = null;
        }
        return () => {
            if (simulationInterval.current) clearInterval(simulationInterval.current);
        };
    }, [isSimulating, settings.stepIntervalMs]);

    const startSimulation = () => {
        if (simulation.current && !simulation.current.isComplete) setIsSimulating(true);
    };

    const pauseSimulation = () => setIsSimulating(false);

    const stepSimulation = () => {
        setIsSimulating(false);
        advanceOnce();
    };

    const resetSimulation = () => {
        setIsSimulating(false);
        simulation.current?.reset();
        setCurrentStep(-1);
        setIsComplete(false);
    };

    return {
        currentStep,
        isSimulating,
        isComplete,
        startSimulation,
        pauseSimulation,
        stepSimulation,
        resetSimulation,
    };
};
