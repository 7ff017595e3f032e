/**
 * Activity Indicator Component
 *
 * WHAT: Spinner that can be started and stopped from a prop.
 *
 * WHY: Callers bind the animation to state instead of mounting and
 * unmounting a spinner themselves.
 *
 * HOW: CSS spin animation toggled by isAnimating. Stopped indicators
 * disappear unless hidesWhenStopped is turned off.
 */

type ActivityIndicatorStyle = 'medium' | 'large';

interface ActivityIndicatorProps {
  isAnimating: boolean;
  style?: ActivityIndicatorStyle;
  color?: 'primary' | 'white' | 'gray';
  hidesWhenStopped?: boolean;
  /** Accessible name announced by screen readers */
  label?: string;
  className?: string;
}

const styleClasses: Record<ActivityIndicatorStyle, string> = {
  medium: 'h-5 w-5 border-2',
  large: 'h-9 w-9 border-[3px]',
};

const colorClasses = {
  primary: 'border-primary-600',
  white: 'border-white',
  gray: 'border-gray-600',
};

function ActivityIndicator({
  isAnimating,
  style = 'medium',
  color = 'primary',
  hidesWhenStopped = true,
  label = 'Loading',
  className = '',
}: ActivityIndicatorProps) {
  if (!isAnimating && hidesWhenStopped) {
    return null;
  }

  return (
    <div
      className={`rounded-full border-t-transparent ${isAnimating ? 'animate-spin' : ''} ${styleClasses[style]} ${colorClasses[color]} ${className}`}
      role="status"
      aria-label={label}
      data-animating={isAnimating}
    >
      <span className="sr-only">{label}...</span>
    </div>
  );
}

export default ActivityIndicator;
