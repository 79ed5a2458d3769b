import React from 'react';
import { AlertCircle, Info } from 'lucide-react';

// --- Card ---
export const Card = ({ children, className = '' }: { children: React.ReactNode, className?: string }) => (
  <div className={`bg-white rounded-xl border border-slate-200 shadow-sm ${className}`}>
    {children}
  </div>
);

export const CardHeader = ({ children, className = '' }: { children: React.ReactNode, className?: string }) => (
  <div className={`p-6 pb-2 ${className}`}>{children}</div>
);

export const CardContent = ({ children, className = '' }: { children: React.ReactNode, className?: string }) => (
  <div className={`p-6 pt-2 ${className}`}>{children}</div>
);

export const CardTitle = ({ children }: { children: React.ReactNode }) => (
  <h3 className="text-lg font-semibold text-slate-900 tracking-tight">{children}</h3>
);

export const CardDescription = ({ children }: { children: React.ReactNode }) => (
  <p className="text-sm text-slate-500 mt-1">{children}</p>
);

// --- Button ---
interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'primary' | 'outline' | 'ghost';
  size?: 'sm' | 'md' | 'lg';
  as?: React.ElementType;
}

const buttonVariants = {
  primary: "bg-slate-900 text-white hover:bg-slate-800",
  outline: "border border-slate-200 bg-transparent hover:bg-slate-100 text-slate-900",
  ghost: "hover:bg-slate-100 text-slate-700",
};

const buttonSizes = {
  sm: "h-8 px-3 text-xs",
  md: "h-10 px-4 py-2 text-sm",
  lg: "h-12 px-8 text-base",
};

export const Button = ({ children, variant = 'primary', size = 'md', className = '', as: Component = 'button', ...props }: ButtonProps) => (
  <Component
    className={`inline-flex items-center justify-center rounded-md font-medium transition-colors focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400 disabled:pointer-events-none disabled:opacity-50 ${buttonVariants[variant]} ${buttonSizes[size]} ${className}`}
    {...props}
  >
    {children}
  </Component>
);

// --- Input (with optional label and header suggestions) ---
interface InputProps extends React.InputHTMLAttributes<HTMLInputElement> {
  label?: string;
  hint?: string;
  suggestions?: string[];
}

export const Input = ({ label, hint, suggestions, id, className = '', ...props }: InputProps) => {
  const listId = suggestions && id ? `${id}-suggestions` : undefined;
  return (
    <div className="w-full">
      {label && <label htmlFor={id} className="text-xs font-medium text-slate-500 mb-1.5 block uppercase tracking-wider">{label}</label>}
      <input
        id={id}
        list={listId}
        className={`flex h-10 w-full rounded-md border border-slate-200 bg-white px-3 py-2 text-sm placeholder:text-slate-500 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400 disabled:cursor-not-allowed disabled:opacity-50 ${className}`}
        {...props}
      />
      {listId && (
        <datalist id={listId}>
          {suggestions?.map(s => <option key={s} value={s} />)}
        </datalist>
      )}
      {hint && <p className="text-[11px] text-slate-400 mt-1">{hint}</p>}
    </div>
  );
};

// --- Badge ---
export const Badge = ({ children, variant, className = '' }: { children: React.ReactNode, variant: 'outline' | 'success' | 'warning', className?: string }) => {
  const styles = {
    outline: "text-slate-900 border border-slate-200",
    success: "bg-green-100 text-green-700 border border-green-200",
    warning: "bg-amber-100 text-amber-700 border border-amber-200",
  };
  return (
    <div className={`inline-flex items-center rounded-full border px-2.5 py-0.5 text-xs font-semibold ${styles[variant]} border-transparent ${className}`}>
      {children}
    </div>
  );
};

// --- Alert ---
export const Alert = ({ children, variant = 'error' }: { children: React.ReactNode, variant?: 'error' | 'info' }) => {
  const Icon = variant === 'error' ? AlertCircle : Info;
  const styles = variant === 'error'
    ? 'bg-red-50 border-red-200 text-red-700'
    : 'bg-blue-50 border-blue-100 text-blue-800';
  return (
    <div role={variant === 'error' ? 'alert' : 'status'} className={`p-3 border rounded-md flex items-start gap-2 text-sm ${styles}`}>
      <Icon size={16} className="mt-0.5 shrink-0" />
      <span>{children}</span>
    </div>
  );
};
