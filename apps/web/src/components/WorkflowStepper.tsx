import type { StepDisplay } from '../../../../src/services/workflow/workflowSteps';

const statusClass = (status: StepDisplay['status']) => {
  switch (status) {
    case 'complete':
      return 'step-pill complete';
    case 'running':
      return 'step-pill running';
    default:
      return 'step-pill';
  }
};

interface WorkflowStepperProps {
  steps: StepDisplay[];
  footer?: string;
}

const WorkflowStepper = ({ steps, footer }: WorkflowStepperProps) => {
  return (
    <div className="workflow-card">
      <ol className="workflow-stepper">
        {steps.map((step, index) => (
          <li key={step.key}>
            <div className={statusClass(step.status)}>
              <span className="step-index">{step.status === 'complete' ? '✓' : index + 1}</span>
              <span>{step.label}</span>
            </div>
          </li>
        ))}
      </ol>
      {footer && <p className="workflow-footer">{footer}</p>}
    </div>
  );
};

export default WorkflowStepper;
